export * from "./types";
export * from "./errors";
export * from "./config";

export * from "./http/HttpContext";
export * from "./cookie/CookieOptions";

export * from "./store/SessionStore";
export * from "./store/MemorySessionStore";
export * from "./store/ExpirySweeper";

export * from "./session/Session";
export * from "./session/SessionId";
export * from "./session/SessionSerializer";

export * from "./auth/AuthBackend";
export * from "./utils/time";
export * from "./utils/timeout";

export * from "./SessionManager";
