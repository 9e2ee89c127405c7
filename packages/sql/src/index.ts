export {
  SqlSessionStore,
  DEFAULT_TABLE_NAME,
  type CleanupJobOptions,
  type SqlSessionStoreOptions,
  type SqlValue,
} from "./SqlSessionStore";

export {
  SqliteExecutor,
  classifySqlError,
  type SqlConnectionInput,
  type SqlExecutor,
  type SqliteConnectionParams,
  type SqliteDatabaseWrapper,
} from "./internal/sqlClient";
