import type { InvalidSessionReason, RequireSessionOptions, SessionManagerOptions } from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import type { CookieDirectiveOptions } from "./cookie/CookieOptions";
import type { AuthBackend } from "./auth/AuthBackend";
import type { SessionRecord, SessionStore } from "./store/SessionStore";
import { resolveSessionManagerConfig, type SessionManagerConfig } from "./config";
import { hasErrorCode, LatchkeyError, toLatchkeyError } from "./errors";
import { Session } from "./session/Session";
import { isSessionId } from "./session/SessionId";
import { nowMs, secondsToMs, secondsUntil } from "./utils/time";

/**
 * Request state keys used on {@link HttpContext}.
 */
export const SESSION_STATE_KEY = "latchkey.session";
export const USER_STATE_KEY = "latchkey.user";

type Resolution = {
    session: Session;
    staleCookie: boolean;
};

/**
 * Binds sessions to requests through a cookie.
 *
 * On entry the cookie is resolved through the store and a {@link Session} handle
 * is attached to the request; after the handler returns, changes are persisted and
 * the matching cookie directive is emitted. Nothing is persisted when the handler
 * throws or the request was aborted.
 */
export class SessionManager {
    private readonly config: SessionManagerConfig;
    private readonly store: SessionStore;
    private readonly isValidSessionId: (value: string) => boolean;

    constructor(private readonly opts: SessionManagerOptions) {
        this.config = resolveSessionManagerConfig(opts);
        this.store = opts.store;
        this.isValidSessionId = opts.isValidSessionId ?? isSessionId;
    }

    get cookieName(): string {
        return this.config.cookie.name;
    }

    middleware(): HttpMiddleware {
        return async (ctx, next) => {
            const { session, staleCookie } = await this.resolve(ctx);
            ctx.setState(SESSION_STATE_KEY, session);

            await next();

            if (ctx.signal?.aborted) {
                this.opts.logger?.debug("Request aborted, session left untouched.");
                return;
            }
            await this.commit(ctx, session, staleCookie);
        };
    }

    /**
     * Returns the handle attached by {@link middleware}.
     */
    getSession(ctx: HttpContext): Session {
        const session = ctx.getState<unknown>(SESSION_STATE_KEY);
        if (!(session instanceof Session)) {
            throw new LatchkeyError("INTERNAL_ERROR", "No session found, is the session middleware installed?");
        }
        return session;
    }

    requireSession(options?: RequireSessionOptions): HttpMiddleware {
        return async (ctx, next) => {
            if (!this.getSession(ctx).isBound) {
                await this.reject(ctx, options);
                return;
            }
            await next();
        };
    }

    /**
     * Records `userId` in the session and moves it to a fresh id, so a token
     * issued before authentication never carries the authenticated session.
     */
    login(ctx: HttpContext, userId: string): Session {
        const session = this.getSession(ctx);
        session.regenerate();
        session.set(this.config.userIdKey, userId);
        return session;
    }

    logout(ctx: HttpContext): void {
        this.getSession(ctx).destroy();
    }

    /**
     * Loads the user the session points at and attaches it to the request.
     * Requests without a user id, or whose user no longer exists, are unauthorized.
     */
    requireUser<TUser>(backend: AuthBackend<TUser>, options?: RequireSessionOptions): HttpMiddleware {
        return async (ctx, next) => {
            const userId = this.getSession(ctx).get(this.config.userIdKey);
            if (typeof userId !== "string" || userId.length === 0) {
                await this.reject(ctx, options);
                return;
            }

            let user: TUser | null;
            try {
                user = await backend.getUser(userId);
            } catch (error) {
                const failure = toLatchkeyError(error);
                this.opts.logger?.error("Failed to load session user.", { error: failure });
                throw failure;
            }

            if (user === null) {
                this.opts.logger?.warn("Session refers to an unknown user.");
                await this.reject(ctx, options);
                return;
            }

            ctx.setState(USER_STATE_KEY, user);
            await next();
        };
    }

    getUser<TUser>(ctx: HttpContext): TUser | null {
        return ctx.getState<TUser>(USER_STATE_KEY);
    }

    private async resolve(ctx: HttpContext): Promise<Resolution> {
        const sessionId = ctx.getCookie(this.config.cookie.name);
        if (!sessionId) {
            return { session: new Session(null), staleCookie: false };
        }

        if (!this.isValidSessionId(sessionId)) {
            this.opts.logger?.debug("Malformed session cookie.");
            await this.invalidSession(ctx, "MALFORMED_SESSION_ID");
            return { session: new Session(null), staleCookie: true };
        }

        let record: SessionRecord | null;
        try {
            record = await this.store.load(sessionId);
        } catch (error) {
            const failure = toLatchkeyError(error);
            if (failure.code === "BACKEND_UNAVAILABLE" && this.config.onBackendFailure === "anonymous") {
                this.opts.logger?.warn("Session store unavailable, continuing anonymously.", { error: failure });
                return { session: new Session(null), staleCookie: false };
            }
            this.opts.logger?.error("Failed to load session.", { error: failure });
            throw failure;
        }

        if (!record) {
            this.opts.logger?.debug("Session not found.");
            await this.invalidSession(ctx, "SESSION_NOT_FOUND");
            return { session: new Session(null), staleCookie: true };
        }

        return { session: new Session(record), staleCookie: false };
    }

    private async commit(ctx: HttpContext, session: Session, staleCookie: boolean): Promise<void> {
        try {
            await this.persist(ctx, session, staleCookie);
        } catch (error) {
            const failure = toLatchkeyError(error);
            this.opts.logger?.error("Failed to persist session.", { error: failure });
            throw failure;
        }
    }

    private async persist(ctx: HttpContext, session: Session, staleCookie: boolean): Promise<void> {
        const loaded = session.loaded;

        if (session.isDestroyed) {
            if (loaded) await this.store.remove(loaded.id);
            if (session.isModified && !session.isEmpty) {
                await this.issue(ctx, session);
            } else if (loaded || (staleCookie && this.config.clearStaleCookie)) {
                this.clearCookie(ctx);
            }
            return;
        }

        if (!loaded) {
            if (session.isModified && !session.isEmpty) {
                await this.issue(ctx, session);
            } else if (staleCookie && this.config.clearStaleCookie) {
                this.clearCookie(ctx);
            }
            return;
        }

        if (session.rotationRequested) {
            // new session first: a failure here leaves the old one intact
            await this.issue(ctx, session);
            await this.store.remove(loaded.id);
            return;
        }

        const now = nowMs();

        if (session.isModified) {
            const expiresAt = this.config.session.slidingExpiration
                ? now + secondsToMs(this.config.session.ttlSeconds)
                : loaded.expiresAt;
            try {
                await this.store.save({ ...loaded, payload: session.toJSON(), lastAccessedAt: now, expiresAt });
            } catch (error) {
                if (hasErrorCode(error, "NOT_FOUND")) {
                    await this.sessionEnded(ctx);
                    return;
                }
                throw error;
            }
            this.setCookie(ctx, loaded.id, expiresAt, now);
            return;
        }

        if (session.keepAliveRequested) {
            const expiresAt = await this.store.touch(loaded.id, this.config.session.ttlSeconds);
            if (expiresAt === null) {
                await this.sessionEnded(ctx);
                return;
            }
            this.setCookie(ctx, loaded.id, expiresAt, now);
            return;
        }

        if (this.config.session.slidingExpiration) {
            this.setCookie(ctx, loaded.id, loaded.expiresAt, now);
        }
    }

    private async issue(ctx: HttpContext, session: Session): Promise<void> {
        const created = await this.store.create(session.toJSON(), this.config.session.ttlSeconds);
        this.setCookie(ctx, created.id, created.expiresAt, nowMs());
    }

    private async sessionEnded(ctx: HttpContext): Promise<void> {
        this.opts.logger?.debug("Session ended during the request.");
        await this.invalidSession(ctx, "SESSION_ENDED");
        this.clearCookie(ctx);
    }

    private async invalidSession(ctx: HttpContext, reason: InvalidSessionReason): Promise<void> {
        if (this.opts.hooks?.onInvalidSession) {
            await this.opts.hooks.onInvalidSession(ctx, reason);
        }
    }

    private async reject(ctx: HttpContext, options?: RequireSessionOptions): Promise<void> {
        if (options?.onFail) {
            await options.onFail(ctx);
            return;
        }
        if (this.opts.hooks?.onUnauthorized) {
            await this.opts.hooks.onUnauthorized(ctx);
            return;
        }
        throw new LatchkeyError("UNAUTHORIZED", "Authentication required.");
    }

    private setCookie(ctx: HttpContext, sessionId: string, expiresAt: number, now: number): void {
        ctx.setCookie(this.config.cookie.name, sessionId, {
            ...this.cookieAttributes(),
            maxAgeSeconds: secondsUntil(expiresAt, now),
        });
    }

    private clearCookie(ctx: HttpContext): void {
        ctx.clearCookie(this.config.cookie.name, { ...this.cookieAttributes(), maxAgeSeconds: 0 });
    }

    private cookieAttributes(): CookieDirectiveOptions {
        const cookie = this.config.cookie;
        return {
            path: cookie.path,
            httpOnly: cookie.httpOnly,
            secure: cookie.secure,
            sameSite: cookie.sameSite,
            ...(cookie.domain !== undefined ? { domain: cookie.domain } : {}),
        };
    }
}
