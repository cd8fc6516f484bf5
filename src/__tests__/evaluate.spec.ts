/**
 * evaluateAccess / endSession tests against an in-memory SessionStore
 */

import { endSession, evaluateAccess } from "../lib/auth/evaluate";
import { initialSession, signalsExpiry } from "../lib/auth/gate";
import type { GateOptions } from "../lib/auth/gate";
import type { SessionStore } from "../lib/auth/session-store";
import type { AuthSession, GateDecision } from "../lib/types";
import { ManualClock } from "./fakes";

class MemorySessionStore implements SessionStore {
  readonly saved: string[] = [];
  readonly removed: string[] = [];
  private readonly sessions = new Map<string, AuthSession>();

  async load(sessionId: string): Promise<AuthSession> {
    return this.sessions.get(sessionId) ?? initialSession();
  }

  async save(sessionId: string, session: AuthSession): Promise<void> {
    this.saved.push(sessionId);
    this.sessions.set(sessionId, session);
  }

  async remove(sessionId: string): Promise<void> {
    this.removed.push(sessionId);
    this.sessions.delete(sessionId);
  }
}

const options: GateOptions = {
  maxAttempts: 5,
  lockoutMs: 3600 * 1000,
  sessionTimeoutMs: 43200 * 1000,
  verifyPin: (pin) => pin === "1234",
};

describe("evaluateAccess", () => {
  let store: MemorySessionStore;
  let clock: ManualClock;

  beforeEach(() => {
    store = new MemorySessionStore();
    clock = new ManualClock(1_700_000_000_000);
  });

  it("locks a session out after five wrong PINs and unlocks it an hour later", async () => {
    const decisions: GateDecision[] = [];
    for (let i = 0; i < 5; i++) {
      const result = await evaluateAccess(store, clock, options, "sid-1", "0000");
      decisions.push(result.decision);
    }

    expect(decisions[3]).toEqual({ kind: "denied-bad-pin", attemptsRemaining: 1 });
    expect(decisions[4]).toEqual({ kind: "denied-locked-out", secondsRemaining: 3600 });

    clock.advance(30 * 60 * 1000);
    const whileLocked = await evaluateAccess(store, clock, options, "sid-1", "1234");
    expect(whileLocked.decision).toEqual({ kind: "denied-locked-out", secondsRemaining: 1800 });

    clock.advance(30 * 60 * 1000);
    const afterLockout = await evaluateAccess(store, clock, options, "sid-1", "1234");
    expect(afterLockout.decision).toEqual({ kind: "granted" });
  });

  it("keeps sessions apart", async () => {
    await evaluateAccess(store, clock, options, "sid-a", "0000");
    const other = await evaluateAccess(store, clock, options, "sid-b", "0000");

    expect(other.decision).toEqual({ kind: "denied-bad-pin", attemptsRemaining: 4 });
  });

  it("does not write when the check changes nothing", async () => {
    await evaluateAccess(store, clock, options, "sid-1");
    expect(store.saved).toEqual([]);
  });

  it("signals an expired session once and then asks for the PIN", async () => {
    await evaluateAccess(store, clock, options, "sid-1", "1234");
    clock.advance(43200 * 1000 + 1);

    const expired = await evaluateAccess(store, clock, options, "sid-1");
    const next = await evaluateAccess(store, clock, options, "sid-1");

    expect(expired.decision).toEqual({ kind: "requires-pin", sessionExpired: true });
    expect(signalsExpiry(expired.decision)).toBe(true);
    expect(next.decision).toEqual({ kind: "requires-pin", sessionExpired: false });
    expect(signalsExpiry(next.decision)).toBe(false);
  });

  it("moves a signed-in record to a fresh session id", async () => {
    const signedIn = await evaluateAccess(store, clock, options, "sid-1", "1234", () => "sid-2");

    expect(signedIn.sessionId).toBe("sid-2");
    expect(signedIn.decision).toEqual({ kind: "granted" });
    expect(store.removed).toEqual(["sid-1"]);

    const onNewId = await evaluateAccess(store, clock, options, "sid-2");
    const onOldId = await evaluateAccess(store, clock, options, "sid-1");
    expect(onNewId.decision).toEqual({ kind: "granted" });
    expect(onOldId.decision).toEqual({ kind: "requires-pin", sessionExpired: false });
  });

  it("keeps the session id for a rejected PIN and for plain checks", async () => {
    const rejected = await evaluateAccess(store, clock, options, "sid-1", "0000", () => "sid-2");
    const plain = await evaluateAccess(store, clock, options, "sid-1", undefined, () => "sid-3");

    expect(rejected.sessionId).toBe("sid-1");
    expect(plain.sessionId).toBe("sid-1");
    expect(store.removed).toEqual([]);
  });

  it("times the session from the sign-in, not from the first visit", async () => {
    await evaluateAccess(store, clock, options, "sid-1");
    clock.advance(11 * 3600 * 1000);
    await evaluateAccess(store, clock, options, "sid-1", "1234", () => "sid-2");

    clock.advance(2 * 3600 * 1000);
    const later = await evaluateAccess(store, clock, options, "sid-2");
    expect(later.decision).toEqual({ kind: "granted" });
  });

  it("ends a session", async () => {
    await evaluateAccess(store, clock, options, "sid-1", "1234");
    await endSession(store, "sid-1");

    const result = await evaluateAccess(store, clock, options, "sid-1");
    expect(result.decision).toEqual({ kind: "requires-pin", sessionExpired: false });
  });
});
