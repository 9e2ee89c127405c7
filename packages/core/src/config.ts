import { z } from "zod";
import { COOKIE_NAME_PATTERN } from "./cookie/CookieOptions";
import { LatchkeyError } from "./errors";

export const DEFAULT_TTL_SECONDS = 60 * 60 * 24 * 7;
export const DEFAULT_MAX_PAYLOAD_BYTES = 64 * 1024;
export const DEFAULT_COOKIE_NAME = "sid";
export const DEFAULT_USER_ID_KEY = "userId";

const ttlSeconds = z.number().int().positive().default(DEFAULT_TTL_SECONDS);
const slidingExpiration = z.boolean().default(false);

/**
 * Options every {@link SessionStore} backend understands.
 */
export const storeOptionsSchema = z.object({
    ttlSeconds,
    slidingExpiration,
    maxPayloadBytes: z.number().int().positive().default(DEFAULT_MAX_PAYLOAD_BYTES),
});

export type StoreOptionsInput = z.input<typeof storeOptionsSchema>;

export const sweeperOptionsSchema = z.object({
    intervalSeconds: z.number().positive().finite(),
});
export type StoreOptions = z.output<typeof storeOptionsSchema>;

export const cookieOptionsSchema = z
    .object({
        name: z.string().regex(COOKIE_NAME_PATTERN, "must be an RFC 6265 token").default(DEFAULT_COOKIE_NAME),
        path: z.string().startsWith("/").default("/"),
        domain: z.string().min(1).optional(),
        httpOnly: z.boolean().default(true),
        secure: z.boolean().default(false),
        sameSite: z.enum(["lax", "strict", "none"]).default("lax"),
    })
    .superRefine((cookie, ctx) => {
        if (cookie.sameSite === "none" && !cookie.secure) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["secure"],
                message: "SameSite=None requires secure cookies",
            });
        }
    });

export type ResolvedCookieOptions = z.output<typeof cookieOptionsSchema>;

export const sessionManagerConfigSchema = z.object({
    cookie: cookieOptionsSchema.default({}),
    session: z.object({ ttlSeconds, slidingExpiration }).default({}),
    clearStaleCookie: z.boolean().default(true),
    onBackendFailure: z.enum(["error", "anonymous"]).default("error"),
    userIdKey: z.string().min(1).default(DEFAULT_USER_ID_KEY),
});

export type SessionManagerConfigInput = z.input<typeof sessionManagerConfigSchema>;
export type SessionManagerConfig = z.output<typeof sessionManagerConfigSchema>;

/**
 * Parses `input` with `schema`, applying defaults. Failures become `INVALID_CONFIG`.
 */
export function parseOptions<TSchema extends z.ZodTypeAny>(
    schema: TSchema,
    input: unknown,
    label: string
): z.output<TSchema> {
    const result = schema.safeParse(input ?? {});
    if (!result.success) {
        throw new LatchkeyError("INVALID_CONFIG", `Invalid ${label}: ${formatIssues(result.error)}`, result.error);
    }
    return result.data;
}

export function resolveStoreOptions(input?: StoreOptionsInput): StoreOptions {
    return parseOptions(storeOptionsSchema, input, "store options");
}

export function resolveSessionManagerConfig(input?: SessionManagerConfigInput): SessionManagerConfig {
    return parseOptions(sessionManagerConfigSchema, input, "session manager options");
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
