/**
 * Application-defined session contents. Values must survive `JSON.stringify`.
 */
export type SessionData = Record<string, unknown>;

export type SessionStatus = "active" | "expired" | "revoked";

/**
 * Persisted session record handled by a {@link SessionStore}.
 *
 * Timestamps are epoch milliseconds and `expiresAt >= lastAccessedAt` always holds
 * for records a store hands out.
 */
export type SessionRecord = {
  id: string;
  payload: SessionData;
  createdAt: number;
  lastAccessedAt: number;
  expiresAt: number;
  status: SessionStatus;
};

/**
 * Storage abstraction for the session lifecycle.
 *
 * These five operations are the whole contract between the middleware and a
 * backend; every implementation must honor them identically.
 */
export interface SessionStore {
  /**
   * Allocates a fresh id and persists a new session expiring `ttlSeconds` from now
   * (the store's configured ttl when omitted).
   */
  create(payload: SessionData, ttlSeconds?: number): Promise<SessionRecord>;

  /**
   * Returns the live session or `null` when it is absent, expired or revoked.
   * Under sliding expiration the same call extends the expiry by a full ttl.
   */
  load(sessionId: string): Promise<SessionRecord | null>;

  /**
   * Overwrites payload and timestamps of a live session. Throws `NOT_FOUND` when
   * the id no longer resolves to one; never inserts.
   */
  save(record: SessionRecord): Promise<void>;

  /** Idempotent. */
  remove(sessionId: string): Promise<void>;

  /**
   * Pushes the expiry to `ttlSeconds` from now without touching the payload.
   * Resolves to the new expiry, or `null` when there was no live session.
   */
  touch(sessionId: string, ttlSeconds?: number): Promise<number | null>;

  close?(): Promise<void>;
}

export function sessionStatusAt(record: SessionRecord, now: number): SessionStatus {
  if (record.status !== "active") return record.status;
  return now >= record.expiresAt ? "expired" : "active";
}

export function isUsable(record: SessionRecord, now: number): boolean {
  return sessionStatusAt(record, now) === "active";
}
