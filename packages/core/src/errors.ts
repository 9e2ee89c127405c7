/**
 * Stable error codes surfaced by latchkey core, stores and adapters.
 */
export type ErrorCode =
    | "UNAUTHORIZED"
    | "NOT_FOUND"
    | "INVALID_SESSION"
    | "INVALID_PAYLOAD"
    | "PAYLOAD_TOO_LARGE"
    | "INVALID_RECORD"
    | "TOKEN_COLLISION"
    | "INVALID_CONFIG"
    | "BACKEND_UNAVAILABLE"
    | "INTERNAL_ERROR";

/**
 * Canonical error type used across latchkey packages.
 */
export class LatchkeyError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "LatchkeyError";
        this.details = details;
    }
}

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract accepted by every latchkey component.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Creates a normalized error response body.
 */
export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link LatchkeyError}.
 */
export function isLatchkeyError(error: unknown): error is LatchkeyError {
    return error instanceof LatchkeyError;
}

/**
 * Narrows to a {@link LatchkeyError} carrying the given code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): error is LatchkeyError {
    return isLatchkeyError(error) && error.code === code;
}

/**
 * Converts unknown errors into {@link LatchkeyError}.
 */
export function toLatchkeyError(error: unknown): LatchkeyError {
    if (isLatchkeyError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new LatchkeyError("INTERNAL_ERROR", error.message, error);
    }

    return new LatchkeyError("INTERNAL_ERROR", "Unexpected internal error.", error);
}

/**
 * Maps {@link ErrorCode} to an HTTP status code.
 */
export function statusFromErrorCode(code: ErrorCode): number {
    switch (code) {
        case "UNAUTHORIZED":
        case "NOT_FOUND":
        case "INVALID_SESSION":
            return 401;
        case "INVALID_PAYLOAD":
            return 400;
        case "PAYLOAD_TOO_LARGE":
            return 413;
        case "BACKEND_UNAVAILABLE":
            return 503;
        case "INVALID_RECORD":
        case "TOKEN_COLLISION":
        case "INVALID_CONFIG":
        case "INTERNAL_ERROR":
        default:
            return 500;
    }
}
