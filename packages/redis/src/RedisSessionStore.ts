import {
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
  RedisClientManager,
  loadEntry,
  pExpire,
  setIfAbsent,
  setIfPresent,
  toRedisStoreError,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
} from "./internal/redisClient";

const DEFAULT_KEY_PREFIX = "latchkey:sess:";
const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

const redisOptionsSchema = z.object({
  keyPrefix: z.string().min(1).default(DEFAULT_KEY_PREFIX),
  /** Upper bound per store call; `0` disables it. */
  commandTimeoutMs: z.number().int().nonnegative().default(DEFAULT_COMMAND_TIMEOUT_MS),
});

/**
 * Configuration for {@link RedisSessionStore}.
 */
export type RedisSessionStoreOptions = StoreOptionsInput &
  z.input<typeof redisOptionsSchema> & {
    generateId?: SessionIdGenerator;
    logger?: Logger;
  };

// the id lives in the key and the expiry in the key's TTL
const storedValueSchema = z.object({
  createdAt: z.number().int(),
  lastAccessedAt: z.number().int(),
  payload: z.record(z.unknown()),
});

type StoredValue = z.infer<typeof storedValueSchema>;

/**
 * Redis-backed implementation of the latchkey `SessionStore`.
 *
 * Expiry is delegated to Redis key TTLs, so expired sessions are reclaimed by the
 * server without a sweep. Sliding loads run as a single script, keeping the read
 * and the expiry bump atomic.
 */
export class RedisSessionStore implements SessionStore {
  private readonly keyPrefix: string;
  private readonly commandTimeoutMs: number;
  private readonly settings: StoreOptions;
  private readonly generateId: SessionIdGenerator;
  private readonly logger: Logger | undefined;
  private readonly clientManager: RedisClientManager;

  constructor(connection: RedisConnectionInput, options?: RedisSessionStoreOptions) {
    this.settings = resolveStoreOptions(options);
    const redisOptions = parseOptions(redisOptionsSchema, options, "redis store options");
    this.keyPrefix = redisOptions.keyPrefix;
    this.commandTimeoutMs = redisOptions.commandTimeoutMs;
    this.clientManager = new RedisClientManager(connection);
    this.generateId = options?.generateId ?? newSessionId;
    this.logger = options?.logger;
  }

  async create(payload: SessionData, ttlSeconds?: number): Promise<SessionRecord> {
    const raw = encodePayload(payload, this.settings.maxPayloadBytes);
    const ttlMs = secondsToMs(ttlSeconds ?? this.settings.ttlSeconds);

    return withFreshSessionId(
      this.generateId,
      async (sessionId) => {
        const now = nowMs();
        const value = encodeValue(raw, now, now);
        const claimed = await this.run("create", (client) => setIfAbsent(client, this.makeKey(sessionId), value, ttlMs));
        if (!claimed) {
          return null;
        }

        return {
          id: sessionId,
          payload: decodePayload(raw),
          createdAt: now,
          lastAccessedAt: now,
          expiresAt: now + ttlMs,
          status: "active",
        };
      },
      this.logger,
    );
  }

  async load(sessionId: string): Promise<SessionRecord | null> {
    const slidingTtlMs = this.settings.slidingExpiration ? secondsToMs(this.settings.ttlSeconds) : 0;
    const entry = await this.run("load", (client) => loadEntry(client, this.makeKey(sessionId), slidingTtlMs));
    if (!entry || entry.ttlMs <= 0) {
      // -2: gone between GET and PTTL, -1: persisted without a TTL
      return null;
    }

    const value = this.decodeValue(entry.raw);
    if (!value) {
      return null;
    }

    const now = nowMs();
    return {
      id: sessionId,
      payload: value.payload,
      createdAt: value.createdAt,
      lastAccessedAt: slidingTtlMs > 0 ? now : value.lastAccessedAt,
      expiresAt: now + entry.ttlMs,
      status: "active",
    };
  }

  async save(record: SessionRecord): Promise<void> {
    const raw = encodePayload(record.payload, this.settings.maxPayloadBytes);
    const now = nowMs();
    const remainingMs = record.expiresAt - now;
    if (remainingMs <= 0) {
      throw notFound(record.id);
    }

    const value = encodeValue(raw, record.createdAt, now);
    const stored = await this.run("save", (client) => setIfPresent(client, this.makeKey(record.id), value, remainingMs));
    if (!stored) {
      throw notFound(record.id);
    }
  }

  async remove(sessionId: string): Promise<void> {
    await this.run("remove", (client) => client.del(this.makeKey(sessionId)));
  }

  async touch(sessionId: string, ttlSeconds?: number): Promise<number | null> {
    const ttlMs = secondsToMs(ttlSeconds ?? this.settings.ttlSeconds);
    const expiresAt = nowMs() + ttlMs;
    const applied = await this.run("touch", (client) => pExpire(client, this.makeKey(sessionId), ttlMs));
    return applied ? expiresAt : null;
  }

  async close(): Promise<void> {
    try {
      await this.clientManager.close();
    } catch (error) {
      throw toRedisStoreError(error, "close");
    }
  }

  private async run<T>(operation: string, command: (client: RedisClientLike) => Promise<T>): Promise<T> {
    try {
      const client = await this.clientManager.getClient();
      return await withTimeout(command(client), this.commandTimeoutMs, operation);
    } catch (error) {
      throw toRedisStoreError(error, operation);
    }
  }

  private decodeValue(raw: string): StoredValue | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger?.warn("Discarding undecodable session value.", { error });
      return null;
    }

    const result = storedValueSchema.safeParse(parsed);
    if (!result.success) {
      this.logger?.warn("Discarding undecodable session value.", { error: result.error });
      return null;
    }
    return result.data;
  }

  private makeKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }
}

// payload is already JSON; splice it in rather than encoding twice
function encodeValue(rawPayload: string, createdAt: number, lastAccessedAt: number): string {
  return `{"createdAt":${createdAt},"lastAccessedAt":${lastAccessedAt},"payload":${rawPayload}}`;
}

function notFound(sessionId: string): LatchkeyError {
  return new LatchkeyError("NOT_FOUND", "Session no longer exists.", undefined, { sessionId });
}

export type { RedisClientLike, RedisConnectionInput, RedisConnectionParams };
