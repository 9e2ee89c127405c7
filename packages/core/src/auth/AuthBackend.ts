/**
 * Resolves users for the session layer. Implemented by the application.
 */
export interface AuthBackend<TUser, TCredentials = unknown> {
    /**
     * Checks credentials (a login form, an API key, ...) and returns the matching
     * user, or `null` when they do not match.
     */
    authenticate(credentials: TCredentials): Promise<TUser | null>;

    /** `null` when the id no longer resolves to a user. */
    getUser(userId: string): Promise<TUser | null>;
}
