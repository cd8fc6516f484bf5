import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { z } from "zod";
import { resolveAccess, unauthorized } from "@/lib/auth/access";
import { getEnv } from "@/lib/env";
import { isImageKey } from "@/lib/gallery/paths";
import { getGallery } from "@/lib/gallery/service";
import { errorResponse } from "@/lib/http";
import { componentLogger } from "@/lib/logger";

const querySchema = z.object({
  key: z.string().min(1).max(1024),
  variant: z.enum(["preview", "fullscreen"]).default("preview"),
});

const logger = componentLogger("api/gallery/thumbnail");

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  try {
    const access = await resolveAccess(request);
    if (access.decision.kind !== "granted") {
      return unauthorized(access.decision);
    }

    const params = request.nextUrl.searchParams;
    const query = querySchema.parse({
      key: params.get("key") ?? undefined,
      variant: params.get("variant") ?? undefined,
    });

    if (!isImageKey(query.key, getEnv().imageExtensions)) {
      return NextResponse.json({ error: "Not an image" }, { status: 400 });
    }

    const gallery = getGallery();
    const thumbnail = await gallery.thumbnails.getThumbnail(gallery.bucket, query.key, query.variant);
    if (!thumbnail) {
      return NextResponse.json({ error: "Cannot load image" }, { status: 404 });
    }

    return new NextResponse(new Uint8Array(thumbnail.data), {
      headers: {
        "Content-Type": thumbnail.contentType,
        "Cache-Control": "no-store",
      },
    });
  } catch (error) {
    return errorResponse(error, logger, "Failed to load thumbnail");
  }
}
