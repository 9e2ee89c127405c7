import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ExpirySweeper,
  LatchkeyError,
  Session,
  decodePayload,
  encodePayload,
  isSessionId,
  newSessionId,
  secondsUntil,
  statusFromErrorCode,
  toLatchkeyError,
  withFreshSessionId,
  type Logger,
} from "../src";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("session ids", () => {
  it("are 43 url-safe characters and never repeat", () => {
    const ids = new Set(Array.from({ length: 1000 }, () => newSessionId()));

    expect(ids.size).toBe(1000);
    for (const id of ids) {
      expect(isSessionId(id)).toBe(true);
    }
  });

  it("rejects values that do not have the token shape", () => {
    expect(isSessionId("")).toBe(false);
    expect(isSessionId("a".repeat(42))).toBe(false);
    expect(isSessionId("a".repeat(44))).toBe(false);
    expect(isSessionId(`${"a".repeat(42)}=`)).toBe(false);
    expect(isSessionId(`${"a".repeat(42)}+`)).toBe(false);
  });

  it("withFreshSessionId_gives_up_after_three_collisions", async () => {
    const tryInsert = vi.fn(async () => null);
    const logger = silentLogger();

    await expect(withFreshSessionId(() => "dup", tryInsert, logger)).rejects.toMatchObject({
      code: "TOKEN_COLLISION",
    });
    expect(tryInsert).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(3);
  });
});

describe("payload encoding", () => {
  it("measures size in UTF-8 bytes", () => {
    // "é" is two bytes: {"k":"éé"} is 12 bytes
    expect(encodePayload({ k: "éé" }, 12)).toBe('{"k":"éé"}');
    expect(() => encodePayload({ k: "éé" }, 11)).toThrow(LatchkeyError);
  });

  it("rejects payloads that cannot be serialized", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(() => encodePayload(cyclic, 1024)).toThrow("Session payload is not serializable.");
  });

  it("only decodes JSON objects", () => {
    expect(decodePayload('{"a":[1,2]}')).toEqual({ a: [1, 2] });
    expect(() => decodePayload("[]")).toThrow("Stored session payload is not an object.");
    expect(() => decodePayload("{")).toThrow("Stored session payload is not valid JSON.");
  });
});

describe("errors", () => {
  it("maps codes to HTTP statuses", () => {
    expect(statusFromErrorCode("UNAUTHORIZED")).toBe(401);
    expect(statusFromErrorCode("NOT_FOUND")).toBe(401);
    expect(statusFromErrorCode("INVALID_PAYLOAD")).toBe(400);
    expect(statusFromErrorCode("PAYLOAD_TOO_LARGE")).toBe(413);
    expect(statusFromErrorCode("BACKEND_UNAVAILABLE")).toBe(503);
    expect(statusFromErrorCode("TOKEN_COLLISION")).toBe(500);
  });

  it("wraps unknown failures as INTERNAL_ERROR", () => {
    const known = new LatchkeyError("NOT_FOUND", "gone");
    expect(toLatchkeyError(known)).toBe(known);
    expect(toLatchkeyError(new Error("boom"))).toMatchObject({ code: "INTERNAL_ERROR", message: "boom" });
    expect(toLatchkeyError(42)).toMatchObject({ code: "INTERNAL_ERROR", message: "Unexpected internal error." });
  });

  it("rounds remaining lifetime up to whole seconds", () => {
    expect(secondsUntil(10_001, 0)).toBe(11);
    expect(secondsUntil(10_000, 0)).toBe(10);
    expect(secondsUntil(0, 5_000)).toBe(0);
  });
});

describe("ExpirySweeper", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the task on every interval until stopped", async () => {
    vi.useFakeTimers();
    const task = vi.fn(async () => 2);
    const logger = silentLogger();
    const sweeper = new ExpirySweeper(task, { intervalSeconds: 10, label: "test", logger });

    sweeper.start();
    expect(sweeper.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(25_000);
    await sweeper.stop();
    await vi.advanceTimersByTimeAsync(30_000);

    expect(task).toHaveBeenCalledTimes(2);
    expect(sweeper.isRunning).toBe(false);
    expect(logger.debug).toHaveBeenCalledWith("Expired sessions swept.", { label: "test", removed: 2 });
  });

  it("logs failed sweeps and keeps going", async () => {
    vi.useFakeTimers();
    const task = vi.fn(async () => {
      throw new Error("disk full");
    });
    const logger = silentLogger();
    const sweeper = new ExpirySweeper(task, { intervalSeconds: 1, logger });

    sweeper.start();
    await vi.advanceTimersByTimeAsync(2_000);
    await sweeper.stop();

    expect(task).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("requires_a_positive_interval", () => {
    const task = vi.fn(async () => 0);

    expect(() => new ExpirySweeper(task, { intervalSeconds: 0 })).toThrow(
      "Invalid sweeper options: intervalSeconds: Number must be greater than 0",
    );
    expect(() => new ExpirySweeper(task, { intervalSeconds: Number.POSITIVE_INFINITY })).toThrow(LatchkeyError);
  });
});

describe("Session handle", () => {
  const record = {
    id: "s1",
    payload: { cart: ["a"], count: 1 },
    createdAt: 0,
    lastAccessedAt: 0,
    expiresAt: 60_000,
    status: "active" as const,
  };

  it("get_returns_copies_so_nested_changes_need_set", () => {
    const session = new Session(record);

    const cart = session.get<string[]>("cart") ?? [];
    cart.push("b");

    expect(session.get("cart")).toEqual(["a"]);
    expect(session.isModified).toBe(false);

    session.set("cart", cart);
    expect(session.isModified).toBe(true);
    expect(session.toJSON()).toEqual({ cart: ["a", "b"], count: 1 });
    expect(record.payload.cart).toEqual(["a"]);
  });

  it("get_returns_scalars_and_missing_keys_as_is", () => {
    const session = new Session(record);

    expect(session.get("count")).toBe(1);
    expect(session.get("missing")).toBeUndefined();
  });
});
