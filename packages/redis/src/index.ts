export {
  RedisSessionStore,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  type RedisSessionStoreOptions,
} from "./RedisSessionStore";

export { LOAD_SESSION_SCRIPT, classifyRedisError, type RedisClientWrapper } from "./internal/redisClient";
