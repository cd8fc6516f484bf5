/**
 * PIN gate state machine.
 *
 * Every transition is a pure function of (session, now, input). The gate
 * never reads the clock, sleeps or touches storage; callers persist the
 * returned session and present the decision.
 */

import type { AuthSession, GateDecision, LockoutStatus } from "@/lib/types";

export type GateOptions = {
  maxAttempts: number;
  lockoutMs: number;
  sessionTimeoutMs: number;
  verifyPin: (pin: string) => boolean;
};

export type GateState = "logged-out" | "locked-out" | "authenticated" | "expired";

export type GateResult = {
  session: AuthSession;
  decision: GateDecision;
};

export const initialSession = (): AuthSession => ({
  authenticated: false,
  authTimeMs: null,
  failedAttempts: 0,
  lockoutUntilMs: null,
});

const secondsUntil = (targetMs: number, now: number): number => {
  return Math.max(0, Math.ceil((targetMs - now) / 1000));
};

const isExpired = (session: AuthSession, now: number, sessionTimeoutMs: number): boolean => {
  return session.authTimeMs === null || now - session.authTimeMs > sessionTimeoutMs;
};

export const describeState = (session: AuthSession, now: number, sessionTimeoutMs: number): GateState => {
  if (session.lockoutUntilMs !== null && now < session.lockoutUntilMs) {
    return "locked-out";
  }

  if (session.authenticated) {
    return isExpired(session, now, sessionTimeoutMs) ? "expired" : "authenticated";
  }

  return "logged-out";
};

const submitPin = (
  session: AuthSession,
  now: number,
  options: GateOptions,
  pin: string,
): GateResult => {
  if (pin.trim().length === 0) {
    return { session, decision: { kind: "denied-no-pin" } };
  }

  if (options.verifyPin(pin)) {
    return {
      session: {
        authenticated: true,
        authTimeMs: now,
        failedAttempts: 0,
        lockoutUntilMs: null,
      },
      decision: { kind: "granted" },
    };
  }

  const failedAttempts = session.failedAttempts + 1;
  if (failedAttempts >= options.maxAttempts) {
    const lockoutUntilMs = now + options.lockoutMs;
    return {
      session: { ...session, failedAttempts, lockoutUntilMs },
      decision: { kind: "denied-locked-out", secondsRemaining: secondsUntil(lockoutUntilMs, now) },
    };
  }

  return {
    session: { ...session, failedAttempts },
    decision: { kind: "denied-bad-pin", attemptsRemaining: options.maxAttempts - failedAttempts },
  };
};

/**
 * Advance the gate by one check.
 *
 * `submittedPin` is undefined for a plain access check (page load, API call)
 * and a string when the user submitted the PIN form.
 */
export const checkAccess = (
  session: AuthSession,
  now: number,
  options: GateOptions,
  submittedPin?: string,
): GateResult => {
  const state = describeState(session, now, options.sessionTimeoutMs);

  if (state === "locked-out" && session.lockoutUntilMs !== null) {
    return {
      session,
      decision: { kind: "denied-locked-out", secondsRemaining: secondsUntil(session.lockoutUntilMs, now) },
    };
  }

  if (state === "authenticated") {
    return { session, decision: { kind: "granted" } };
  }

  // A lockout that has run out starts the counter again.
  let current = session.lockoutUntilMs === null ? session : { ...session, failedAttempts: 0, lockoutUntilMs: null };

  const sessionExpired = state === "expired";
  if (sessionExpired) {
    current = initialSession();
  }

  if (submittedPin === undefined) {
    return { session: current, decision: { kind: "requires-pin", sessionExpired } };
  }

  return submitPin(current, now, options, submittedPin);
};

export const logout = (): AuthSession => initialSession();

/** True only for the single check that turned an authenticated session back into a logged-out one. */
export const signalsExpiry = (decision: GateDecision): boolean =>
  decision.kind === "requires-pin" && decision.sessionExpired;

export const toLockoutStatus = (session: AuthSession, now: number, maxAttempts: number): LockoutStatus => {
  const lockUntilEpochMs = session.lockoutUntilMs ?? 0;
  const retryAfterSeconds = secondsUntil(lockUntilEpochMs, now);

  return {
    isLocked: retryAfterSeconds > 0,
    failedAttempts: session.failedAttempts,
    maxAttempts,
    lockUntilEpochMs,
    retryAfterSeconds,
  };
};
