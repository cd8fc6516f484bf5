import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { systemClock } from "@/lib/clock";
import { getEnv } from "@/lib/env";
import { endSession, evaluateAccess } from "@/lib/auth/evaluate";
import { signalsExpiry, toLockoutStatus } from "@/lib/auth/gate";
import type { GateOptions } from "@/lib/auth/gate";
import type { SessionOutcome } from "@/lib/auth/evaluate";
import { verifyPin } from "@/lib/auth/pin";
import { getSessionId, newSessionId, setSessionCookie } from "@/lib/auth/session";
import { TableSessionStore } from "@/lib/auth/session-store";
import type { SessionStore } from "@/lib/auth/session-store";
import { componentLogger } from "@/lib/logger";
import type { GateDecision, LockoutStatus } from "@/lib/types";

export type AccessContext = SessionOutcome & {
  /** The response must carry a freshly signed cookie for `sessionId`. */
  issueCookie: boolean;
  lockout: LockoutStatus;
};

const logger = componentLogger("auth");

let cachedStore: SessionStore | null = null;

const getSessionStore = (): SessionStore => {
  if (!cachedStore) {
    cachedStore = new TableSessionStore();
  }

  return cachedStore;
};

const getGateOptions = (): GateOptions => {
  const env = getEnv();

  return {
    maxAttempts: env.authMaxAttempts,
    lockoutMs: env.authLockoutSeconds * 1000,
    sessionTimeoutMs: env.sessionTimeoutSeconds * 1000,
    verifyPin: (pin) => verifyPin(pin, getEnv().galleryPin),
  };
};

export const resolveAccess = async (request: NextRequest, submittedPin?: string): Promise<AccessContext> => {
  const existingId = await getSessionId(request);
  const requestedId = existingId ?? newSessionId();
  const options = getGateOptions();

  const result = await evaluateAccess(
    getSessionStore(),
    systemClock,
    options,
    requestedId,
    submittedPin,
    newSessionId,
  );

  if (submittedPin !== undefined) {
    if (result.decision.kind === "granted") {
      logger.info({ sessionId: result.sessionId }, "PIN accepted");
    } else if (result.decision.kind === "denied-locked-out") {
      logger.warn(
        { sessionId: result.sessionId, retryAfterSeconds: result.decision.secondsRemaining },
        "PIN rejected: locked out",
      );
    } else if (result.decision.kind === "denied-bad-pin") {
      logger.warn(
        { sessionId: result.sessionId, attemptsRemaining: result.decision.attemptsRemaining },
        "PIN rejected",
      );
    }
  }

  if (signalsExpiry(result.decision)) {
    logger.info({ sessionId: result.sessionId }, "Session expired");
  }

  return {
    ...result,
    issueCookie: existingId === null || result.sessionId !== requestedId,
    lockout: toLockoutStatus(result.session, systemClock.now(), options.maxAttempts),
  };
};

export const logoutRequest = async (request: NextRequest): Promise<void> => {
  const sessionId = await getSessionId(request);
  if (sessionId) {
    await endSession(getSessionStore(), sessionId);
  }
};

/** Attach the session cookie when this request started or rotated the session. */
export const withSession = async (response: NextResponse, context: AccessContext): Promise<NextResponse> => {
  if (context.issueCookie) {
    await setSessionCookie(response, context.sessionId);
  }

  return response;
};

export const unauthorized = (decision: GateDecision) =>
  NextResponse.json(
    { error: "Unauthorized", sessionExpired: signalsExpiry(decision) },
    {
      status: 401,
    },
  );
