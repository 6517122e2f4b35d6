export { SqliteDocumentStore } from './store.js';
export type { SqliteDocumentStoreConfig } from './store.js';
export { SqliteConnection, renderSqliteValue } from './connection.js';
export { SqliteQueries } from './queries.js';
