import type Database from "better-sqlite3";
import { LatchkeyError } from "@latchkey/core";

export type SqlValue = string | number | null;

/**
 * Minimal driver contract: `?` placeholders, rows as plain objects.
 */
export interface SqlExecutor {
  query(sql: string, params: readonly SqlValue[]): Promise<unknown[]>;
  /** Resolves to the number of affected rows. */
  execute(sql: string, params: readonly SqlValue[]): Promise<number>;
  close?(): Promise<void>;
}

export type SqliteConnectionParams = {
  filename: string;
  readonly?: boolean;
  /** Busy timeout handed to SQLite. */
  timeoutMs?: number;
};

export type SqliteDatabaseWrapper = {
  database: Database.Database;
  manageDatabase?: boolean;
};

export type SqlConnectionInput = SqlExecutor | SqliteDatabaseWrapper | SqliteConnectionParams;

/**
 * {@link SqlExecutor} over a better-sqlite3 handle. Statements are prepared once
 * per SQL text.
 */
export class SqliteExecutor implements SqlExecutor {
  private readonly statements = new Map<string, Database.Statement<unknown[]>>();

  constructor(private readonly db: Database.Database) {}

  async query(sql: string, params: readonly SqlValue[]): Promise<unknown[]> {
    return this.prepare(sql).all(...params);
  }

  async execute(sql: string, params: readonly SqlValue[]): Promise<number> {
    return this.prepare(sql).run(...params).changes;
  }

  async close(): Promise<void> {
    this.statements.clear();
    this.db.close();
  }

  private prepare(sql: string): Database.Statement<unknown[]> {
    let statement = this.statements.get(sql);
    if (!statement) {
      statement = this.db.prepare<unknown[]>(sql);
      this.statements.set(sql, statement);
    }
    return statement;
  }
}

export class SqlClientManager {
  private readonly ownExecutor: boolean;
  private readonly connectionInput: SqlConnectionInput;
  private executor: SqlExecutor | null = null;
  private executorInitPromise: Promise<SqlExecutor> | null = null;
  private closed = false;

  constructor(connection: SqlConnectionInput) {
    this.connectionInput = connection;

    if (isSqlExecutor(connection)) {
      this.ownExecutor = false;
      this.executor = connection;
      return;
    }

    if (isDatabaseWrapper(connection)) {
      this.ownExecutor = connection.manageDatabase ?? false;
      this.executor = new SqliteExecutor(connection.database);
      return;
    }

    this.ownExecutor = true;
  }

  async getExecutor(): Promise<SqlExecutor> {
    if (this.closed) {
      throw new LatchkeyError("BACKEND_UNAVAILABLE", "Session store is closed.");
    }

    if (this.executor) {
      return this.executor;
    }

    if (!this.executorInitPromise) {
      this.executorInitPromise = this.openOwnedDatabase();
    }

    try {
      this.executor = await this.executorInitPromise;
    } catch (error) {
      this.executorInitPromise = null;
      throw error;
    }
    return this.executor;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const executor = this.executor;
    this.executor = null;
    if (this.ownExecutor && executor?.close) {
      await executor.close();
    }
  }

  private async openOwnedDatabase(): Promise<SqlExecutor> {
    const connection = this.connectionInput;
    if (isSqlExecutor(connection) || isDatabaseWrapper(connection)) {
      throw new LatchkeyError("INTERNAL_ERROR", "Connection is not owned by the store.");
    }

    const { default: BetterSqlite3 } = await import("better-sqlite3");
    const options: Database.Options = {
      ...(connection.readonly !== undefined ? { readonly: connection.readonly } : {}),
      ...(connection.timeoutMs !== undefined ? { timeout: connection.timeoutMs } : {}),
    };
    return new SqliteExecutor(new BetterSqlite3(connection.filename, options));
  }
}

export function isSqlExecutor(value: unknown): value is SqlExecutor {
  if (!value || typeof value !== "object") {
    return false;
  }

  return "query" in value && typeof value.query === "function" && "execute" in value && typeof value.execute === "function";
}

export function isDatabaseWrapper(value: unknown): value is SqliteDatabaseWrapper {
  if (!value || typeof value !== "object") {
    return false;
  }

  return "database" in value && typeof value.database === "object" && value.database !== null;
}

const UNAVAILABLE_CODE_PREFIXES = ["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_CANTOPEN", "SQLITE_IOERR", "SQLITE_FULL"];

const NETWORK_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "EPIPE"]);

const UNAVAILABLE_KEYWORDS = ["not open", "database is locked", "connection", "timeout", "terminated", "too many clients"];

/**
 * Wraps a failed statement. Busy, locked and unreachable databases become
 * `BACKEND_UNAVAILABLE`; everything else is `INTERNAL_ERROR`.
 */
export function toSqlStoreError(error: unknown, operation: string): LatchkeyError {
  if (error instanceof LatchkeyError) {
    return error;
  }

  const code = classifySqlError(error);
  return new LatchkeyError(
    code,
    code === "BACKEND_UNAVAILABLE" ? "Session store is unavailable." : "SQL session operation failed.",
    error,
    {
      operation,
      sqlCode: getErrorCode(error),
    },
  );
}

export function classifySqlError(error: unknown): "BACKEND_UNAVAILABLE" | "INTERNAL_ERROR" {
  const code = getErrorCode(error);
  if (NETWORK_CODES.has(code) || UNAVAILABLE_CODE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
    return "BACKEND_UNAVAILABLE";
  }

  const msg = (error instanceof Error ? error.message : String(error ?? "")).toLowerCase();
  if (UNAVAILABLE_KEYWORDS.some((k) => msg.includes(k))) {
    return "BACKEND_UNAVAILABLE";
  }

  return "INTERNAL_ERROR";
}

function getErrorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code ?? "").toUpperCase();
  }
  return "";
}
