import {
  defaultErrorBody,
  isLatchkeyError,
  LatchkeyError,
  statusFromErrorCode,
  type CookieDirectiveOptions,
  type HttpContext,
  type HttpMiddleware,
} from "@latchkey/core";
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";

/**
 * Adapter options for Hono integration.
 */
export type HonoAdapterOptions = {
  onError?: (error: LatchkeyError, c: Context) => Promise<Response | void> | Response | void;
};

type HonoHttpContext = HttpContext & {
  _getDirectResponse: () => Response | null;
};

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 *
 * Request state lives in Hono's context variables, so every context created for
 * the same request sees the same session.
 */
export function createHonoHttpContext(c: Context): HttpContext {
  return createContext(c);
}

function createContext(c: Context): HonoHttpContext {
  let statusCode = 200;
  let directResponse: Response | null = null;

  return {
    signal: c.req.raw.signal,

    getCookie(name: string): string | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      return parseCookie(raw)[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeCookie(name, value, toSerializeOptions(options)), { append: true });
    },

    clearCookie(name, options) {
      c.header("Set-Cookie", serializeCookie(name, "", toSerializeOptions({ ...options, maxAgeSeconds: 0 })), {
        append: true,
      });
    },

    setState<T>(key: string, value: T): void {
      (c.set as (key: string, value: unknown) => void)(key, value);
    },

    getState<T>(key: string): T | null {
      return ((c.get as (key: string) => unknown)(key) as T | undefined) ?? null;
    },

    status(code: number): void {
      statusCode = code;
      (c.status as (value: number) => void)(code);
    },

    json(body: unknown): void {
      directResponse = (c.json as (value: unknown, status?: number) => Response)(body, statusCode);
    },

    _getDirectResponse(): Response | null {
      return directResponse;
    },
  };
}

/**
 * Converts core middleware into a Hono middleware handler.
 *
 * A handler failure that Hono already turned into an error response is rethrown
 * into the core middleware, so nothing is persisted for a failed request.
 */
export function toHonoMiddleware(middleware: HttpMiddleware, options?: HonoAdapterOptions): MiddlewareHandler {
  return async (c, next) => {
    const ctx = createContext(c);

    let nextCalled = false;
    try {
      await middleware(ctx, async () => {
        nextCalled = true;
        await next();
        if (c.error) {
          throw c.error;
        }
      });
    } catch (error) {
      if (isLatchkeyError(error)) {
        if (options?.onError) {
          const handled = await options.onError(error, c);
          if (handled) {
            return handled;
          }
          if (c.finalized) {
            return;
          }
        }
        return (c.json as (value: unknown, status?: number) => Response)(
          defaultErrorBody(error.code, error.message),
          statusFromErrorCode(error.code),
        );
      }
      throw error;
    }

    if (c.finalized) {
      return;
    }

    if (!nextCalled) {
      const response = ctx._getDirectResponse();
      if (response) {
        return response;
      }
      return (c.body as (data: null, status?: number) => Response)(null, c.res.status || 200);
    }
  };
}

function toSerializeOptions(options: CookieDirectiveOptions): SerializeOptions {
  return {
    path: options.path ?? "/",
    httpOnly: options.httpOnly ?? true,
    ...(options.domain !== undefined ? { domain: options.domain } : {}),
    ...(options.secure !== undefined ? { secure: options.secure } : {}),
    ...(options.sameSite !== undefined ? { sameSite: options.sameSite } : {}),
    ...(options.maxAgeSeconds !== undefined ? { maxAge: options.maxAgeSeconds } : {}),
  };
}
