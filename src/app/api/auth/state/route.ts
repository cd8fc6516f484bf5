import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { resolveAccess, withSession } from "@/lib/auth/access";
import { signalsExpiry } from "@/lib/auth/gate";
import { errorResponse } from "@/lib/http";
import { componentLogger } from "@/lib/logger";

const logger = componentLogger("api/auth/state");

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  try {
    const access = await resolveAccess(request);
    const { decision, lockout } = access;

    return withSession(
      NextResponse.json({
        authenticated: decision.kind === "granted",
        sessionExpired: signalsExpiry(decision),
        lockout,
      }),
      access,
    );
  } catch (error) {
    return errorResponse(error, logger, "Failed to fetch state");
  }
}
