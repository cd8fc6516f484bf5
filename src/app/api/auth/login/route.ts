import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { z } from "zod";
import { resolveAccess, withSession } from "@/lib/auth/access";
import { errorResponse } from "@/lib/http";
import { componentLogger } from "@/lib/logger";

const bodySchema = z.object({
  pin: z.string().max(64),
});

const logger = componentLogger("api/auth/login");

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  let pin: string;
  try {
    const body = bodySchema.parse(await request.json());
    pin = body.pin;
  } catch {
    return NextResponse.json(
      { error: "Invalid request payload" },
      {
        status: 400,
      },
    );
  }

  try {
    const access = await resolveAccess(request, pin);
    const { decision, lockout } = access;

    if (decision.kind === "granted") {
      return withSession(NextResponse.json({ success: true }), access);
    }

    if (decision.kind === "denied-locked-out") {
      return withSession(
        NextResponse.json(
          {
            error: `Too many failed attempts. Try again in ${decision.secondsRemaining} seconds.`,
            lockout,
          },
          { status: 423 },
        ),
        access,
      );
    }

    if (decision.kind === "denied-bad-pin") {
      return withSession(
        NextResponse.json(
          {
            error: `Incorrect PIN. ${decision.attemptsRemaining} attempts remaining.`,
            attemptsRemaining: decision.attemptsRemaining,
            lockout,
          },
          { status: 401 },
        ),
        access,
      );
    }

    return withSession(NextResponse.json({ error: "Please enter a PIN", lockout }, { status: 400 }), access);
  } catch (error) {
    return errorResponse(error, logger, "Login failed");
  }
}
