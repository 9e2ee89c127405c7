import { describe, expect, it } from "vitest";
import { Hono } from "hono";
import { LatchkeyError, type HttpMiddleware } from "@latchkey/core";
import { createHonoHttpContext, toHonoMiddleware } from "../src";

const unauthorizedMiddleware: HttpMiddleware = async () => {
  throw new LatchkeyError("UNAUTHORIZED", "Authentication required.");
};

describe("HonoAdapter", () => {
  it("maps UNAUTHORIZED to default JSON response", async () => {
    const app = new Hono();

    app.use("/me", toHonoMiddleware(unauthorizedMiddleware));
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me");
    expect(res.status).toBe(401);
    await expect(res.json()).resolves.toEqual({
      error: {
        code: "UNAUTHORIZED",
        message: "Authentication required.",
      },
    });
  });

  it("maps BACKEND_UNAVAILABLE to 503", async () => {
    const app = new Hono();

    app.use(
      "/me",
      toHonoMiddleware(async () => {
        throw new LatchkeyError("BACKEND_UNAVAILABLE", "Session store is unavailable.");
      }),
    );
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me");
    expect(res.status).toBe(503);
    await expect(res.json()).resolves.toEqual({
      error: { code: "BACKEND_UNAVAILABLE", message: "Session store is unavailable." },
    });
  });

  it("supports onError override", async () => {
    const app = new Hono();

    app.use(
      "/me",
      toHonoMiddleware(unauthorizedMiddleware, {
        onError(_error, c) {
          return c.redirect("/login", 302);
        },
      }),
    );
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me", { redirect: "manual" });
    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe("/login");
  });

  it("returns the response written through the context when next is not called", async () => {
    const app = new Hono();

    app.use(
      "/me",
      toHonoMiddleware(async (ctx) => {
        ctx.status(403);
        ctx.json({ error: "forbidden" });
      }),
    );
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me");
    expect(res.status).toBe(403);
    await expect(res.json()).resolves.toEqual({ error: "forbidden" });
  });

  it("appends multiple Set-Cookie values", async () => {
    const app = new Hono();

    app.use(
      "/cookie",
      toHonoMiddleware(async (ctx, next) => {
        ctx.setCookie("sid", "token-1", { path: "/", httpOnly: true, maxAgeSeconds: 60 });
        ctx.clearCookie("other", { path: "/", httpOnly: true });
        await next();
      }),
    );
    app.get("/cookie", (c) => c.text("ok"));

    const res = await app.request("http://localhost/cookie");
    const cookies = res.headers.getSetCookie().map((value) => value.split("; ").sort());

    expect(cookies).toEqual([
      ["HttpOnly", "Max-Age=60", "Path=/", "sid=token-1"],
      ["HttpOnly", "Max-Age=0", "Path=/", "other="],
    ]);
  });

  it("reads cookies and shares request state between contexts", async () => {
    const app = new Hono();

    app.use(
      "/state",
      toHonoMiddleware(async (ctx, next) => {
        ctx.setState("seen", ctx.getCookie("sid"));
        await next();
      }),
    );
    app.get("/state", (c) => {
      const ctx = createHonoHttpContext(c);
      return c.json({ seen: ctx.getState<string>("seen"), missing: ctx.getCookie("absent") });
    });

    const res = await app.request("http://localhost/state", { headers: { cookie: "theme=dark; sid=abc" } });
    await expect(res.json()).resolves.toEqual({ seen: "abc", missing: null });
  });
});
