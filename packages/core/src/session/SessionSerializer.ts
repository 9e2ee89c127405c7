import { LatchkeyError } from "../errors";
import type { SessionData } from "../store/SessionStore";

/**
 * Encodes a payload to JSON, rejecting it before any write when its UTF-8 size
 * exceeds `maxBytes`.
 */
export function encodePayload(payload: SessionData, maxBytes: number): string {
  let raw: string;
  try {
    raw = JSON.stringify(payload);
  } catch (error) {
    throw new LatchkeyError("INVALID_PAYLOAD", "Session payload is not serializable.", error);
  }

  const size = Buffer.byteLength(raw, "utf8");
  if (size > maxBytes) {
    throw new LatchkeyError("PAYLOAD_TOO_LARGE", "Session payload exceeds the configured size.", undefined, {
      size,
      maxBytes,
    });
  }
  return raw;
}

export function decodePayload(raw: string): SessionData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new LatchkeyError("INVALID_PAYLOAD", "Stored session payload is not valid JSON.", error);
  }

  if (!isSessionData(parsed)) {
    throw new LatchkeyError("INVALID_PAYLOAD", "Stored session payload is not an object.");
  }
  return parsed;
}

export function isSessionData(value: unknown): value is SessionData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep copy through JSON, the same shape a persistent backend would hand back.
 */
export function clonePayload(payload: SessionData): SessionData {
  return decodePayload(JSON.stringify(payload));
}

export function cloneValue(value: unknown): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  const copy: unknown = JSON.parse(JSON.stringify(value));
  return copy;
}
