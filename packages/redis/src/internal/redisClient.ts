import { LatchkeyError } from "@latchkey/core";

export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(...args: unknown[]): Promise<unknown>;
  del(key: string): Promise<number | unknown>;
  pExpire?(key: string, ttlMs: number): Promise<unknown>;
  pexpire?(key: string, ttlMs: number): Promise<unknown>;
  pTTL?(key: string): Promise<number>;
  pttl?(key: string): Promise<number>;
  eval?(...args: unknown[]): Promise<unknown>;
  connect?(): Promise<unknown>;
  quit?(): Promise<unknown>;
  disconnect?(): Promise<unknown>;
  isOpen?: boolean;
  status?: string;
}

export type RedisConnectionParams = {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: number;
  tls?: boolean;
  redisOptions?: Record<string, unknown>;
};

export type RedisClientWrapper = {
  client: RedisClientLike;
  manageClient?: boolean;
  /** The client connects itself on its first command (ioredis `lazyConnect`). */
  lazyConnect?: boolean;
};

export type RedisConnectionInput = RedisClientLike | RedisClientWrapper | RedisConnectionParams;

/**
 * Reads a session, optionally pushing its expiry forward, and reports the
 * remaining lifetime in one round trip.
 *
 * KEYS[1] session key, ARGV[1] sliding ttl in ms (0 leaves the expiry alone).
 * Replies nil for a missing key, otherwise `{ value, pttl }`.
 */
export const LOAD_SESSION_SCRIPT = [
  "local raw = redis.call('GET', KEYS[1])",
  "if not raw then return nil end",
  "local ttl = tonumber(ARGV[1])",
  "if ttl > 0 then redis.call('PEXPIRE', KEYS[1], ttl) end",
  "return {raw, redis.call('PTTL', KEYS[1])}",
].join("\n");

export type LoadedEntry = {
  raw: string;
  ttlMs: number;
};

export class RedisClientManager {
  private readonly ownClient: boolean;
  private readonly connectionInput: RedisConnectionInput;
  private client: RedisClientLike | null = null;
  private clientInitPromise: Promise<RedisClientLike> | null = null;

  constructor(connection: RedisConnectionInput) {
    this.connectionInput = connection;

    if (isRedisClientLike(connection)) {
      this.ownClient = false;
      this.client = connection;
      return;
    }

    if (isClientWrapper(connection)) {
      this.ownClient = connection.manageClient ?? false;
      this.client = connection.client;
      return;
    }

    this.ownClient = true;
  }

  async getClient(): Promise<RedisClientLike> {
    if (this.client) {
      await ensureConnected(this.client, this.connectionInput);
      return this.client;
    }

    if (!this.clientInitPromise) {
      this.clientInitPromise = this.createOwnedClient();
    }

    try {
      this.client = await this.clientInitPromise;
    } catch (error) {
      this.clientInitPromise = null;
      throw error;
    }
    return this.client;
  }

  async close(): Promise<void> {
    if (!this.ownClient || !this.client) {
      return;
    }

    const client = this.client;
    this.client = null;
    this.clientInitPromise = null;

    if (typeof client.quit === "function") {
      await client.quit();
      return;
    }

    if (typeof client.disconnect === "function") {
      await client.disconnect();
    }
  }

  private async createOwnedClient(): Promise<RedisClientLike> {
    const connection = this.connectionInput;
    if (isRedisClientLike(connection)) {
      await ensureConnected(connection, connection);
      return connection;
    }

    if (isClientWrapper(connection)) {
      await ensureConnected(connection.client, connection);
      return connection.client;
    }

    const redisModule = await import("redis");
    const createClientFn = (
      redisModule as unknown as { createClient?: (options?: Record<string, unknown>) => RedisClientLike }
    ).createClient;

    if (!createClientFn) {
      throw new LatchkeyError("INVALID_CONFIG", "redis.createClient is not available. Ensure 'redis' package is installed.");
    }

    const client = createClientFn(buildNodeRedisOptions(connection));
    await ensureConnected(client, connection);
    return client;
  }
}

/**
 * `SET key value NX PX ttl`. Resolves to whether the key was written.
 */
export async function setIfAbsent(client: RedisClientLike, key: string, value: string, ttlMs: number): Promise<boolean> {
  const reply = takesOptionObjects(client)
    ? await client.set(key, value, { NX: true, PX: ttlMs })
    : await client.set(key, value, "PX", ttlMs, "NX");
  return isOk(reply);
}

/**
 * `SET key value XX PX ttl`. Never creates a key that is gone.
 */
export async function setIfPresent(client: RedisClientLike, key: string, value: string, ttlMs: number): Promise<boolean> {
  const reply = takesOptionObjects(client)
    ? await client.set(key, value, { XX: true, PX: ttlMs })
    : await client.set(key, value, "PX", ttlMs, "XX");
  return isOk(reply);
}

export async function pExpire(client: RedisClientLike, key: string, ttlMs: number): Promise<boolean> {
  if (typeof client.pExpire === "function") {
    return isApplied(await client.pExpire(key, ttlMs));
  }

  if (typeof client.pexpire === "function") {
    return isApplied(await client.pexpire(key, ttlMs));
  }

  throw new LatchkeyError("INVALID_CONFIG", "Redis client supports neither pExpire nor pexpire.");
}

export async function pTtl(client: RedisClientLike, key: string): Promise<number> {
  if (typeof client.pTTL === "function") {
    return client.pTTL(key);
  }

  if (typeof client.pttl === "function") {
    return client.pttl(key);
  }

  throw new LatchkeyError("INVALID_CONFIG", "Redis client supports neither pTTL nor pttl.");
}

/**
 * Runs {@link LOAD_SESSION_SCRIPT}, or the same three commands one by one on
 * clients without `eval`.
 */
export async function loadEntry(client: RedisClientLike, key: string, slidingTtlMs: number): Promise<LoadedEntry | null> {
  if (typeof client.eval === "function") {
    const reply = takesOptionObjects(client)
      ? await client.eval(LOAD_SESSION_SCRIPT, { keys: [key], arguments: [String(slidingTtlMs)] })
      : await client.eval(LOAD_SESSION_SCRIPT, 1, key, String(slidingTtlMs));
    return parseLoadReply(reply);
  }

  const raw = await client.get(key);
  if (raw === null) {
    return null;
  }

  if (slidingTtlMs > 0) {
    await pExpire(client, key, slidingTtlMs);
  }
  return { raw, ttlMs: await pTtl(client, key) };
}

function parseLoadReply(reply: unknown): LoadedEntry | null {
  if (reply === null || reply === undefined) {
    return null;
  }

  if (Array.isArray(reply) && typeof reply[0] === "string" && typeof reply[1] === "number") {
    return { raw: reply[0], ttlMs: reply[1] };
  }

  throw new LatchkeyError("INTERNAL_ERROR", "Unexpected reply from the session load script.");
}

/**
 * node-redis v4 takes command flags as an options object and drops positional
 * ones; ioredis-style clients only take positional flags. node-redis clients are
 * recognised by their camelCase commands or their `isOpen` flag.
 */
export function takesOptionObjects(client: RedisClientLike): boolean {
  return typeof client.pExpire === "function" || typeof client.isOpen === "boolean";
}

export function isRedisClientLike(value: unknown): value is RedisClientLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  return (
    "get" in value &&
    typeof value.get === "function" &&
    "set" in value &&
    typeof value.set === "function" &&
    "del" in value &&
    typeof value.del === "function"
  );
}

export function isClientWrapper(value: unknown): value is RedisClientWrapper {
  if (!value || typeof value !== "object") {
    return false;
  }

  return "client" in value && isRedisClientLike(value.client);
}

/**
 * Wraps a failed command. Connection-class failures become
 * `BACKEND_UNAVAILABLE`; everything else is `INTERNAL_ERROR`.
 */
export function toRedisStoreError(error: unknown, operation: string): LatchkeyError {
  if (error instanceof LatchkeyError) {
    return error;
  }

  const code = classifyRedisError(error);
  return new LatchkeyError(
    code,
    code === "BACKEND_UNAVAILABLE" ? "Session store is unavailable." : "Redis session operation failed.",
    error,
    {
      operation,
      redisCode: getErrorCode(error),
    },
  );
}

export function classifyRedisError(error: unknown): "BACKEND_UNAVAILABLE" | "INTERNAL_ERROR" {
  const msg = (error instanceof Error ? error.message : String(error ?? "")).toLowerCase();
  const code = getErrorCode(error);

  const storeCodes = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "NR_CLOSED"]);

  if (storeCodes.has(code)) {
    return "BACKEND_UNAVAILABLE";
  }

  const storeKeywords = [
    "connect",
    "connection",
    "socket",
    "closed",
    "timeout",
    "read only",
    "loading",
    "clusterdown",
    "try again",
    "no connection",
    "the client is closed",
  ];

  if (storeKeywords.some((k) => msg.includes(k))) {
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

function isOk(result: unknown): boolean {
  return result === "OK" || result === true;
}

function isApplied(result: unknown): boolean {
  return result === 1 || result === true;
}

function buildNodeRedisOptions(connection: RedisConnectionParams): Record<string, unknown> {
  const socket: Record<string, unknown> = {};

  if (connection.host) {
    socket.host = connection.host;
  }

  if (connection.port !== undefined) {
    socket.port = connection.port;
  }

  if (connection.tls) {
    socket.tls = true;
  }

  const options: Record<string, unknown> = {
    ...(connection.redisOptions ?? {}),
  };

  if (connection.url) {
    options.url = connection.url;
  }

  if (Object.keys(socket).length > 0) {
    const baseSocket = options.socket;
    options.socket = {
      ...(typeof baseSocket === "object" && baseSocket !== null ? baseSocket : {}),
      ...socket,
    };
  }

  if (connection.username) {
    options.username = connection.username;
  }

  if (connection.password) {
    options.password = connection.password;
  }

  if (connection.database !== undefined) {
    options.database = connection.database;
  }

  return options;
}

async function ensureConnected(client: RedisClientLike, input: RedisConnectionInput): Promise<void> {
  if (isClientReady(client)) {
    return;
  }

  if (isClientWrapper(input) && input.lazyConnect) {
    return;
  }

  if (typeof client.connect === "function") {
    await client.connect();
  }
}

function isClientReady(client: RedisClientLike): boolean {
  if (client.isOpen === true) {
    return true;
  }

  if (typeof client.status === "string") {
    return client.status === "ready" || client.status === "connect" || client.status === "connecting";
  }

  return false;
}
