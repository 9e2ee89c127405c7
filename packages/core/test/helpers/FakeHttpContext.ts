import type { CookieDirectiveOptions, HttpContext } from "../../src";

export type CookieRecord = {
  name: string;
  value: string;
  options: CookieDirectiveOptions;
};

export class FakeHttpContext implements HttpContext {
  private readonly state = new Map<string, unknown>();
  private readonly requestCookies: Map<string, string>;
  private readonly controller = new AbortController();
  readonly setCookies: CookieRecord[] = [];
  readonly clearedCookies: CookieRecord[] = [];
  responseStatus = 200;
  responseBody: unknown = null;

  constructor(private readonly jar: Map<string, string> = new Map()) {
    this.requestCookies = new Map(jar);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  abort(): void {
    this.controller.abort();
  }

  get directiveCount(): number {
    return this.setCookies.length + this.clearedCookies.length;
  }

  getCookie(name: string): string | null {
    return this.requestCookies.get(name) ?? null;
  }

  setCookie(name: string, value: string, options: CookieDirectiveOptions): void {
    this.jar.set(name, value);
    this.setCookies.push({ name, value, options });
  }

  clearCookie(name: string, options: CookieDirectiveOptions): void {
    this.jar.delete(name);
    this.clearedCookies.push({ name, value: "", options });
  }

  setState<T>(key: string, value: T): void {
    this.state.set(key, value);
  }

  getState<T>(key: string): T | null {
    return (this.state.get(key) as T | undefined) ?? null;
  }

  status(code: number): void {
    this.responseStatus = code;
  }

  json(body: unknown): void {
    this.responseBody = body;
  }
}
