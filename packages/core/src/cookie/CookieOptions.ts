/**
 * Cookie configuration shared by the session middleware and adapters.
 */
export type CookieOptions = {
    name?: string; // default "sid"
    path?: string; // default "/"
    domain?: string;
    httpOnly?: boolean; // default true
    secure?: boolean; // default false
    sameSite?: "lax" | "strict" | "none"; // default "lax"
};

/**
 * Attributes of a single Set-Cookie directive.
 */
export type CookieDirectiveOptions = Omit<CookieOptions, "name"> & { maxAgeSeconds?: number };

// RFC 6265 token characters.
export const COOKIE_NAME_PATTERN = /^[A-Za-z0-9!#$%&'*+\-.^_`|~]+$/;
