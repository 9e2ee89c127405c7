import type { CookieDirectiveOptions } from "../cookie/CookieOptions";

/**
 * Framework-neutral HTTP context required by the session middleware.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(name: string, value: string, options: CookieDirectiveOptions): void;
    clearCookie(name: string, options: CookieDirectiveOptions): void;

    // Per-request state
    setState<T>(key: string, value: T): void;
    getState<T>(key: string): T | null;

    // Response helpers (adapters should implement these)
    status(code: number): void;
    json(body: unknown): void;

    /** Aborted when the client went away; persistence is skipped then. */
    readonly signal?: AbortSignal;
}

/**
 * Middleware function signature used by latchkey core.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
