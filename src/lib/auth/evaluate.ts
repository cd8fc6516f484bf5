import type { Clock } from "@/lib/clock";
import { checkAccess, logout } from "@/lib/auth/gate";
import type { GateOptions, GateResult } from "@/lib/auth/gate";
import type { SessionStore } from "@/lib/auth/session-store";
import type { AuthSession } from "@/lib/types";

const sameSession = (a: AuthSession, b: AuthSession): boolean =>
  a.authenticated === b.authenticated &&
  a.authTimeMs === b.authTimeMs &&
  a.failedAttempts === b.failedAttempts &&
  a.lockoutUntilMs === b.lockoutUntilMs;

export type SessionOutcome = GateResult & {
  /** Id the record now lives under; differs from the requested one after a sign-in. */
  sessionId: string;
};

/**
 * Load the session record, run one gate check and persist the outcome if it
 * changed. When a submitted PIN is granted and `nextSessionId` is given, the
 * record moves to a fresh id and the old one is removed.
 */
export const evaluateAccess = async (
  store: SessionStore,
  clock: Clock,
  options: GateOptions,
  sessionId: string,
  submittedPin?: string,
  nextSessionId?: () => string,
): Promise<SessionOutcome> => {
  const current = await store.load(sessionId);
  const result = checkAccess(current, clock.now(), options, submittedPin);

  if (submittedPin !== undefined && result.decision.kind === "granted" && nextSessionId) {
    const rotatedId = nextSessionId();
    await store.save(rotatedId, result.session);
    await store.remove(sessionId);
    return { ...result, sessionId: rotatedId };
  }

  if (!sameSession(current, result.session)) {
    await store.save(sessionId, result.session);
  }
  return { ...result, sessionId };
};

export const endSession = async (store: SessionStore, sessionId: string): Promise<void> => {
  await store.save(sessionId, logout());
};
