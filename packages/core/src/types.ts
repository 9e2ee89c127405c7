import type {CookieDirectiveOptions, CookieOptions} from "./cookie/CookieOptions";
import type {SessionData, SessionRecord, SessionStore} from "./store/SessionStore";
import type {HttpContext, HttpMiddleware} from "./http/HttpContext";
import type {Logger} from "./errors";
import type {SessionManagerConfigInput} from "./config";

/**
 * Why a session cookie did not resolve to a usable session.
 */
export type InvalidSessionReason =
    | "MALFORMED_SESSION_ID"
    | "SESSION_NOT_FOUND"
    | "SESSION_ENDED";

/**
 * Root configuration for creating a {@link SessionManager}.
 *
 * `session.ttlSeconds` and `session.slidingExpiration` describe what the
 * middleware asks of the store and how it refreshes cookies; keep them in line
 * with the store's own options.
 */
export type SessionManagerOptions = SessionManagerConfigInput & {
    store: SessionStore;

    /** Cookie values failing this check are treated as anonymous. */
    isValidSessionId?: (value: string) => boolean;

    hooks?: {
        onUnauthorized?: (ctx: HttpContext) => Promise<void> | void;
        onInvalidSession?: (ctx: HttpContext, reason: InvalidSessionReason) => Promise<void> | void;
    };

    logger?: Logger;
};

/**
 * Options for {@link SessionManager.requireSession} and {@link SessionManager.requireUser}.
 */
export type RequireSessionOptions = {
    onFail?: (ctx: HttpContext) => Promise<void> | void;
};

// Re-export commonly used types
export type {
    CookieOptions,
    CookieDirectiveOptions,
    SessionStore,
    SessionRecord,
    SessionData,
    HttpContext,
    HttpMiddleware,
};
