import { initialSession } from "@/lib/auth/gate";
import { getAuthTableClient, initializeStorage, isNotFoundError } from "@/lib/storage/azure";
import type { AuthSession } from "@/lib/types";

export interface SessionStore {
  load(sessionId: string): Promise<AuthSession>;
  save(sessionId: string, session: AuthSession): Promise<void>;
  remove(sessionId: string): Promise<void>;
}

type SessionEntity = {
  partitionKey: string;
  rowKey: string;
  authenticated: boolean;
  authTimeMs: number;
  failedAttempts: number;
  lockoutUntilMs: number;
  updatedAt: string;
};

const PARTITION_KEY = "sessions";

// Table storage has no null, so absent timestamps are stored as 0.
const toEntity = (sessionId: string, session: AuthSession): SessionEntity => ({
  partitionKey: PARTITION_KEY,
  rowKey: sessionId,
  authenticated: session.authenticated,
  authTimeMs: session.authTimeMs ?? 0,
  failedAttempts: session.failedAttempts,
  lockoutUntilMs: session.lockoutUntilMs ?? 0,
  updatedAt: new Date().toISOString(),
});

const fromEntity = (entity: Partial<SessionEntity>): AuthSession => {
  const authTimeMs = Number(entity.authTimeMs ?? 0);
  const lockoutUntilMs = Number(entity.lockoutUntilMs ?? 0);

  return {
    authenticated: entity.authenticated === true,
    authTimeMs: authTimeMs > 0 ? authTimeMs : null,
    failedAttempts: Math.max(0, Number(entity.failedAttempts ?? 0)),
    lockoutUntilMs: lockoutUntilMs > 0 ? lockoutUntilMs : null,
  };
};

export class TableSessionStore implements SessionStore {
  async load(sessionId: string): Promise<AuthSession> {
    await initializeStorage();
    const authTableClient = getAuthTableClient();

    try {
      const entity = await authTableClient.getEntity<SessionEntity>(PARTITION_KEY, sessionId);
      return fromEntity(entity);
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }

      return initialSession();
    }
  }

  async save(sessionId: string, session: AuthSession): Promise<void> {
    await initializeStorage();
    const authTableClient = getAuthTableClient();
    await authTableClient.upsertEntity(toEntity(sessionId, session), "Replace");
  }

  async remove(sessionId: string): Promise<void> {
    await initializeStorage();
    const authTableClient = getAuthTableClient();

    try {
      await authTableClient.deleteEntity(PARTITION_KEY, sessionId);
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
  }
}
