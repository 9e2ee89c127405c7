import { LOAD_SESSION_SCRIPT, type RedisClientLike } from "../../src";

type Entry = {
  value: string;
  expiresAt: number | null;
};

type SetFlags = {
  nx: boolean;
  xx: boolean;
  px: number | null;
};

/**
 * In-process key space shared by the client stand-ins. Keys expire against
 * `Date.now()`, so fake timers drive expiry.
 */
export abstract class InMemoryRedisClient implements RedisClientLike {
  readonly entries = new Map<string, Entry>();
  readonly commands: string[] = [];
  quitCalls = 0;

  async get(key: string): Promise<string | null> {
    this.commands.push("get");
    return this.live(key)?.value ?? null;
  }

  async set(...args: unknown[]): Promise<unknown> {
    this.commands.push("set");
    const [key, value, ...rest] = args;
    if (typeof key !== "string" || typeof value !== "string") {
      throw new Error("ERR syntax error");
    }

    const flags = parseSetFlags(rest);
    const exists = this.live(key) !== null;
    if ((flags.nx && exists) || (flags.xx && !exists)) {
      return null;
    }

    this.entries.set(key, { value, expiresAt: flags.px === null ? null : Date.now() + flags.px });
    return "OK";
  }

  async del(key: string): Promise<number> {
    this.commands.push("del");
    return this.entries.delete(key) ? 1 : 0;
  }

  async quit(): Promise<string> {
    this.quitCalls += 1;
    return "OK";
  }

  protected expire(key: string, ttlMs: number): boolean {
    const entry = this.live(key);
    if (!entry) {
      return false;
    }
    entry.expiresAt = Date.now() + ttlMs;
    return true;
  }

  protected ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) {
      return -2;
    }
    return entry.expiresAt === null ? -1 : entry.expiresAt - Date.now();
  }

  protected live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  protected runLoadScript(script: unknown, key: string, ttlMs: number): unknown {
    if (script !== LOAD_SESSION_SCRIPT) {
      throw new Error("NOSCRIPT No matching script.");
    }

    const entry = this.live(key);
    if (!entry) {
      return null;
    }
    if (ttlMs > 0) {
      this.expire(key, ttlMs);
    }
    return [entry.value, this.ttl(key)];
  }
}

/**
 * Stand-in for a node-redis v4 client: camelCase commands, flags as objects.
 */
export class FakeRedisClient extends InMemoryRedisClient {
  async pExpire(key: string, ttlMs: number): Promise<boolean> {
    this.commands.push("pExpire");
    return this.expire(key, ttlMs);
  }

  async pTTL(key: string): Promise<number> {
    this.commands.push("pTTL");
    return this.ttl(key);
  }
}

/**
 * Adds node-redis `eval(script, { keys, arguments })`, understanding only the
 * session load script.
 */
export class ScriptingRedisClient extends FakeRedisClient {
  async eval(...args: unknown[]): Promise<unknown> {
    this.commands.push("eval");
    const [script, options] = args;
    const { key, ttlMs } = parseEvalOptions(options);
    return this.runLoadScript(script, key, ttlMs);
  }
}

/**
 * Stand-in for a node-redis client that has to be connected first.
 */
export class ConnectingRedisClient extends FakeRedisClient {
  isOpen = false;
  connectCalls = 0;

  async connect(): Promise<this> {
    this.connectCalls += 1;
    this.isOpen = true;
    return this;
  }

  override async get(key: string): Promise<string | null> {
    if (!this.isOpen) {
      throw new Error("The client is closed");
    }
    return super.get(key);
  }

  override async set(...args: unknown[]): Promise<unknown> {
    if (!this.isOpen) {
      throw new Error("The client is closed");
    }
    return super.set(...args);
  }
}

/**
 * ioredis-style client: lowercase commands and positional SET flags only.
 */
export class PositionalRedisClient extends InMemoryRedisClient {
  override async set(...args: unknown[]): Promise<unknown> {
    if (args.some((arg) => typeof arg === "object" && arg !== null)) {
      throw new Error("ERR syntax error");
    }
    return super.set(...args);
  }

  async pexpire(key: string, ttlMs: number): Promise<number> {
    this.commands.push("pexpire");
    return this.expire(key, ttlMs) ? 1 : 0;
  }

  async pttl(key: string): Promise<number> {
    this.commands.push("pttl");
    return this.ttl(key);
  }
}

/**
 * Adds ioredis `eval(script, numKeys, ...keysAndArgs)`.
 */
export class PositionalScriptingRedisClient extends PositionalRedisClient {
  async eval(...args: unknown[]): Promise<unknown> {
    this.commands.push("eval");
    const [script, numKeys, key, ttlMs] = args;
    if (numKeys !== 1 || typeof key !== "string") {
      throw new Error("ERR wrong number of arguments for 'eval' command");
    }
    return this.runLoadScript(script, key, Number(ttlMs));
  }
}

function parseSetFlags(rest: unknown[]): SetFlags {
  const flags: SetFlags = { nx: false, xx: false, px: null };
  const [first] = rest;

  if (typeof first === "object" && first !== null) {
    flags.nx = "NX" in first && first.NX === true;
    flags.xx = "XX" in first && first.XX === true;
    flags.px = "PX" in first && typeof first.PX === "number" ? first.PX : null;
    return flags;
  }

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (token === "NX") flags.nx = true;
    if (token === "XX") flags.xx = true;
    if (token === "PX") {
      const value = rest[i + 1];
      flags.px = typeof value === "number" ? value : Number(value);
      i += 1;
    }
  }
  return flags;
}

function parseEvalOptions(options: unknown): { key: string; ttlMs: number } {
  if (typeof options !== "object" || options === null || !("keys" in options) || !("arguments" in options)) {
    throw new Error("ERR wrong number of arguments for 'eval' command");
  }

  const { keys, arguments: argv } = options;
  if (!Array.isArray(keys) || !Array.isArray(argv) || typeof keys[0] !== "string") {
    throw new Error("ERR wrong number of arguments for 'eval' command");
  }
  return { key: keys[0], ttlMs: Number(argv[0]) };
}
