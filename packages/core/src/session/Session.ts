import { clonePayload, cloneValue } from "./SessionSerializer";
import type { SessionData, SessionRecord, SessionStatus } from "../store/SessionStore";

/**
 * Where a request's session stands:
 * - `none`: no session bound and nothing written
 * - `bound`: a stored session is attached and unchanged
 * - `dirty`: data changed (or a rotation was asked for) and must be persisted
 * - `removed`: the handler asked for the session to be destroyed
 */
export type SessionState = "none" | "bound" | "dirty" | "removed";

/**
 * Request-scoped view of a session.
 *
 * The middleware owns the handle for the whole request and reclaims it after the
 * handler returns; handlers must not keep it beyond that.
 */
export class Session {
    private data: SessionData;
    private modified = false;
    private destroyed = false;
    private rotate = false;
    private keepAliveFlag = false;

    /**
     * @param loaded the record the store returned for this request, `null` when anonymous
     */
    constructor(readonly loaded: SessionRecord | null) {
        this.data = loaded ? clonePayload(loaded.payload) : {};
    }

    /** Id of the bound session; `null` for anonymous requests. */
    get id(): string | null {
        return this.loaded?.id ?? null;
    }

    get isBound(): boolean {
        return this.loaded !== null;
    }

    get createdAt(): number | null {
        return this.loaded?.createdAt ?? null;
    }

    get expiresAt(): number | null {
        return this.loaded?.expiresAt ?? null;
    }

    get status(): SessionStatus | null {
        if (!this.loaded) return null;
        return this.destroyed ? "revoked" : this.loaded.status;
    }

    get state(): SessionState {
        if (this.destroyed) return "removed";
        if (this.modified || this.rotate) return "dirty";
        return this.loaded ? "bound" : "none";
    }

    get isEmpty(): boolean {
        return Object.keys(this.data).length === 0;
    }

    get isModified(): boolean {
        return this.modified;
    }

    get isDestroyed(): boolean {
        return this.destroyed;
    }

    get rotationRequested(): boolean {
        return this.rotate;
    }

    get keepAliveRequested(): boolean {
        return this.keepAliveFlag;
    }

    /**
     * Returns a copy of the stored value. Changes to nested objects or arrays are
     * only persisted once written back with {@link set}.
     */
    get<T = unknown>(key: string): T | undefined {
        return cloneValue(this.data[key]) as T | undefined;
    }

    has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data, key);
    }

    /**
     * Stores a JSON-serializable value. `undefined` deletes the key. Writing to an
     * anonymous handle starts a new session when the request completes.
     */
    set(key: string, value: unknown): void {
        if (value === undefined) {
            this.delete(key);
            return;
        }
        this.data[key] = value;
        this.modified = true;
    }

    delete(key: string): boolean {
        if (!this.has(key)) return false;
        delete this.data[key];
        this.modified = true;
        return true;
    }

    clear(): void {
        this.data = {};
        this.modified = true;
    }

    /**
     * Keeps the data but moves it to a fresh id when the request completes.
     * Call it on privilege changes such as login.
     */
    regenerate(): void {
        this.rotate = true;
    }

    /**
     * Removes the session when the request completes. Data written afterwards
     * starts a brand-new session.
     */
    destroy(): void {
        this.destroyed = true;
        this.data = {};
        this.modified = false;
        this.rotate = false;
    }

    /**
     * Refreshes the expiry at the end of the request without rewriting the payload.
     */
    keepAlive(): void {
        this.keepAliveFlag = true;
    }

    toJSON(): SessionData {
        return clonePayload(this.data);
    }
}
