import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { z } from "zod";
import { resolveAccess, unauthorized } from "@/lib/auth/access";
import { getEnv } from "@/lib/env";
import { normalizePrefix } from "@/lib/gallery/paths";
import { getGallery, loadGalleryPage } from "@/lib/gallery/service";
import { errorResponse } from "@/lib/http";
import { componentLogger } from "@/lib/logger";

const querySchema = z.object({
  prefix: z.string().max(1024).default(""),
  page: z.coerce.number().int().min(0).default(0),
  pageSize: z.coerce.number().int().min(1).max(100).optional(),
});

const logger = componentLogger("api/gallery");

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
      prefix: params.get("prefix") ?? undefined,
      page: params.get("page") ?? undefined,
      pageSize: params.get("pageSize") ?? undefined,
    });

    const page = await loadGalleryPage(
      getGallery(),
      normalizePrefix(query.prefix),
      query.page,
      query.pageSize ?? getEnv().imagesPerPage,
    );

    return NextResponse.json(page);
  } catch (error) {
    return errorResponse(error, logger, "Failed to load gallery");
  }
}
