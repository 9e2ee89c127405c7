export { createHonoHttpContext, toHonoMiddleware, type HonoAdapterOptions } from "./HonoAdapter";
