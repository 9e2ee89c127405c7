import {
  ExpirySweeper,
  LatchkeyError,
  decodePayload,
  encodePayload,
  newSessionId,
  nowMs,
  parseOptions,
  resolveStoreOptions,
  secondsToMs,
  withFreshSessionId,
  withTimeout,
  type Logger,
  type SessionData,
  type SessionIdGenerator,
  type SessionRecord,
  type SessionStore,
  type StoreOptions,
  type StoreOptionsInput,
} from "@latchkey/core";
import { z } from "zod";
import {
  SqlClientManager,
  toSqlStoreError,
  type SqlConnectionInput,
  type SqlExecutor,
  type SqlValue,
} from "./internal/sqlClient";

export const DEFAULT_TABLE_NAME = "latchkey_sessions";
const DEFAULT_QUERY_TIMEOUT_MS = 5000;

const sqlOptionsSchema = z.object({
  tableName: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]{0,62}$/, "must be a plain SQL identifier")
    .default(DEFAULT_TABLE_NAME),
  queryTimeoutMs: z.number().int().nonnegative().default(DEFAULT_QUERY_TIMEOUT_MS),
});

/**
 * Configuration for {@link SqlSessionStore}.
 */
export type SqlSessionStoreOptions = StoreOptionsInput &
  z.input<typeof sqlOptionsSchema> & {
    generateId?: SessionIdGenerator;
    logger?: Logger;
  };

export type CleanupJobOptions = {
  intervalSeconds: number;
};

// drivers hand back BIGINT columns as strings
const sessionRowSchema = z.object({
  id: z.string(),
  payload: z.string(),
  created_at: z.coerce.number().int(),
  last_accessed_at: z.coerce.number().int(),
  expires_at: z.coerce.number().int(),
});

type Statements = {
  schema: string[];
  insert: string;
  select: string;
  slide: string;
  update: string;
  touch: string;
  remove: string;
  purge: string;
};

/**
 * Relational `SessionStore`. One row per session; payloads are stored as JSON
 * text and every read filters on `expires_at`, so expired rows are invisible
 * until {@link SqlSessionStore.deleteExpired} reclaims them.
 */
export class SqlSessionStore implements SessionStore {
  private readonly settings: StoreOptions;
  private readonly tableName: string;
  private readonly queryTimeoutMs: number;
  private readonly generateId: SessionIdGenerator;
  private readonly logger: Logger | undefined;
  private readonly clientManager: SqlClientManager;
  private readonly sql: Statements;

  constructor(connection: SqlConnectionInput, options?: SqlSessionStoreOptions) {
    this.settings = resolveStoreOptions(options);
    const sqlOptions = parseOptions(sqlOptionsSchema, options, "sql store options");
    this.tableName = sqlOptions.tableName;
    this.queryTimeoutMs = sqlOptions.queryTimeoutMs;
    this.generateId = options?.generateId ?? newSessionId;
    this.logger = options?.logger;
    this.clientManager = new SqlClientManager(connection);
    this.sql = buildStatements(this.tableName);
  }

  /**
   * Creates the session table and its expiry index when missing.
   */
  async ensureSchema(): Promise<void> {
    for (const statement of this.sql.schema) {
      await this.run("ensureSchema", (db) => db.execute(statement, []));
    }
  }

  async create(payload: SessionData, ttlSeconds?: number): Promise<SessionRecord> {
    const raw = encodePayload(payload, this.settings.maxPayloadBytes);
    const ttlMs = secondsToMs(ttlSeconds ?? this.settings.ttlSeconds);

    return withFreshSessionId(
      this.generateId,
      async (sessionId) => {
        const now = nowMs();
        const expiresAt = now + ttlMs;
        const inserted = await this.run("create", (db) =>
          db.execute(this.sql.insert, [sessionId, raw, now, now, expiresAt]),
        );
        if (inserted === 0) {
          return null;
        }

        return {
          id: sessionId,
          payload: decodePayload(raw),
          createdAt: now,
          lastAccessedAt: now,
          expiresAt,
          status: "active",
        };
      },
      this.logger,
    );
  }

  async load(sessionId: string): Promise<SessionRecord | null> {
    const now = nowMs();
    const rows = this.settings.slidingExpiration
      ? await this.run("load", (db) =>
          db.query(this.sql.slide, [now, now + secondsToMs(this.settings.ttlSeconds), sessionId, now]),
        )
      : await this.run("load", (db) => db.query(this.sql.select, [sessionId, now]));

    const [row] = rows;
    return row === undefined ? null : this.toRecord(row);
  }

  async save(record: SessionRecord): Promise<void> {
    const raw = encodePayload(record.payload, this.settings.maxPayloadBytes);
    const now = nowMs();
    if (record.expiresAt <= now) {
      throw notFound(record.id);
    }

    const updated = await this.run("save", (db) =>
      db.execute(this.sql.update, [raw, now, record.expiresAt, record.id, now]),
    );
    if (updated === 0) {
      throw notFound(record.id);
    }
  }

  async remove(sessionId: string): Promise<void> {
    await this.run("remove", (db) => db.execute(this.sql.remove, [sessionId]));
  }

  async touch(sessionId: string, ttlSeconds?: number): Promise<number | null> {
    const now = nowMs();
    const expiresAt = now + secondsToMs(ttlSeconds ?? this.settings.ttlSeconds);
    const updated = await this.run("touch", (db) => db.execute(this.sql.touch, [now, expiresAt, sessionId, now]));
    return updated > 0 ? expiresAt : null;
  }

  /**
   * Deletes every expired row. Returns how many went away.
   */
  async deleteExpired(): Promise<number> {
    return this.run("deleteExpired", (db) => db.execute(this.sql.purge, [nowMs()]));
  }

  /**
   * A sweeper running {@link deleteExpired}; the caller decides when to start it.
   */
  createCleanupJob(options: CleanupJobOptions): ExpirySweeper {
    return new ExpirySweeper(() => this.deleteExpired(), {
      intervalSeconds: options.intervalSeconds,
      label: `sql:${this.tableName}`,
      ...(this.logger ? { logger: this.logger } : {}),
    });
  }

  async close(): Promise<void> {
    try {
      await this.clientManager.close();
    } catch (error) {
      throw toSqlStoreError(error, "close");
    }
  }

  private async run<T>(operation: string, statement: (db: SqlExecutor) => Promise<T>): Promise<T> {
    try {
      const db = await this.clientManager.getExecutor();
      return await withTimeout(statement(db), this.queryTimeoutMs, operation);
    } catch (error) {
      throw toSqlStoreError(error, operation);
    }
  }

  private toRecord(row: unknown): SessionRecord | null {
    const parsed = sessionRowSchema.safeParse(row);
    if (!parsed.success) {
      this.logger?.warn("Discarding malformed session row.", { table: this.tableName, error: parsed.error });
      return null;
    }

    let payload: SessionData;
    try {
      payload = decodePayload(parsed.data.payload);
    } catch (error) {
      this.logger?.warn("Discarding malformed session row.", { table: this.tableName, error });
      return null;
    }

    return {
      id: parsed.data.id,
      payload,
      createdAt: parsed.data.created_at,
      lastAccessedAt: parsed.data.last_accessed_at,
      expiresAt: parsed.data.expires_at,
      status: "active",
    };
  }
}

function buildStatements(table: string): Statements {
  const columns = "id, payload, created_at, last_accessed_at, expires_at";
  return {
    schema: [
      `CREATE TABLE IF NOT EXISTS ${table} (
        id TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        last_accessed_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS ${table}_expires_at_idx ON ${table} (expires_at)`,
    ],
    insert: `INSERT INTO ${table} (${columns}) VALUES (?, ?, ?, ?, ?) ON CONFLICT (id) DO NOTHING`,
    select: `SELECT ${columns} FROM ${table} WHERE id = ? AND expires_at > ?`,
    slide: `UPDATE ${table} SET last_accessed_at = ?, expires_at = ? WHERE id = ? AND expires_at > ? RETURNING ${columns}`,
    update: `UPDATE ${table} SET payload = ?, last_accessed_at = ?, expires_at = ? WHERE id = ? AND expires_at > ?`,
    touch: `UPDATE ${table} SET last_accessed_at = ?, expires_at = ? WHERE id = ? AND expires_at > ?`,
    remove: `DELETE FROM ${table} WHERE id = ?`,
    purge: `DELETE FROM ${table} WHERE expires_at <= ?`,
  };
}

function notFound(sessionId: string): LatchkeyError {
  return new LatchkeyError("NOT_FOUND", "Session no longer exists.", undefined, { sessionId });
}

export type { SqlValue };
