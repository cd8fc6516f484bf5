import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { z } from "zod";
import { resolveAccess, unauthorized } from "@/lib/auth/access";
import { getEnv } from "@/lib/env";
import { fileNameOf, isImageKey } from "@/lib/gallery/paths";
import { getGallery } from "@/lib/gallery/service";
import { errorResponse } from "@/lib/http";
import { componentLogger } from "@/lib/logger";

const querySchema = z.object({
  key: z.string().min(1).max(1024),
});

const logger = componentLogger("api/gallery/download");

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const contentDisposition = (fileName: string): string => {
  const ascii = fileName.replace(/[^a-zA-Z0-9._-]/g, "-");
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
};

export async function GET(request: NextRequest) {
  try {
    const access = await resolveAccess(request);
    if (access.decision.kind !== "granted") {
      return unauthorized(access.decision);
    }

    const { key } = querySchema.parse({ key: request.nextUrl.searchParams.get("key") ?? undefined });
    if (!isImageKey(key, getEnv().imageExtensions)) {
      return NextResponse.json({ error: "Not an image" }, { status: 400 });
    }

    // Full fidelity: straight from the store, never through the thumbnail cache.
    const gallery = getGallery();
    const result = await gallery.gateway.get(gallery.bucket, key);
    if (!result.ok) {
      logger.warn({ key, err: result.error }, "Download failed");
      return NextResponse.json({ error: `Download failed: ${fileNameOf(key)}` }, { status: 502 });
    }

    return new NextResponse(new Uint8Array(result.value.data), {
      headers: {
        "Content-Type": result.value.contentType ?? "application/octet-stream",
        "Content-Disposition": contentDisposition(fileNameOf(key)),
      },
    });
  } catch (error) {
    return errorResponse(error, logger, "Download failed");
  }
}
