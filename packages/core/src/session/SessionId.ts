import { randomBytes } from "node:crypto";
import { LatchkeyError, type Logger } from "../errors";

const SESSION_ID_BYTES = 32;
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{43}$/;

export const MAX_SESSION_ID_ATTEMPTS = 3;

export type SessionIdGenerator = () => string;

/**
 * 256 bits from the OS CSPRNG, base64url without padding.
 */
export function newSessionId(): string {
    return randomBytes(SESSION_ID_BYTES).toString("base64url");
}

export function isSessionId(value: string): boolean {
    return SESSION_ID_PATTERN.test(value);
}

/**
 * Runs `tryInsert` with fresh ids until it claims one (returns non-null).
 * Gives up with `TOKEN_COLLISION` after {@link MAX_SESSION_ID_ATTEMPTS}.
 */
export async function withFreshSessionId<T>(
    generate: SessionIdGenerator,
    tryInsert: (sessionId: string) => Promise<T | null>,
    logger?: Logger
): Promise<T> {
    for (let attempt = 1; attempt <= MAX_SESSION_ID_ATTEMPTS; attempt++) {
        const result = await tryInsert(generate());
        if (result !== null) return result;
        logger?.warn("Session id collision.", { attempt });
    }

    throw new LatchkeyError("TOKEN_COLLISION", "Could not allocate a unique session id.", undefined, {
        attempts: MAX_SESSION_ID_ATTEMPTS,
    });
}
