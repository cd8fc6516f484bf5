import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { logoutRequest } from "@/lib/auth/access";
import { errorResponse } from "@/lib/http";
import { componentLogger } from "@/lib/logger";

const logger = componentLogger("api/auth/logout");

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  try {
    await logoutRequest(request);
    return NextResponse.json({ success: true });
  } catch (error) {
    return errorResponse(error, logger, "Logout failed");
  }
}
