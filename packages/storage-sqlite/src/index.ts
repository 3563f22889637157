/**
 * @drover/storage-sqlite - SQLite backend for deployment records
 */

export { SqliteDeploymentStore } from "./deployment-store.js";
export type { SqliteStoreOptions } from "./deployment-store.js";
export { ensureSchema, SCHEMA_VERSION } from "./schema.js";

// Errors
export { Storage, ErrCorruptRecord, ErrSchemaTooNew } from "./errors.js";
