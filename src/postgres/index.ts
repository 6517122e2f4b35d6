export { PostgresDocumentStore } from './store.js';
export type { JsonbDocumentStore, PostgresDocumentStoreConfig } from './store.js';
export { PostgresConnection, renderPostgresValue } from './connection.js';
export type { Queryable } from './connection.js';
export {
  DocumentIndex,
  PostgresQueries,
  ensureDocumentIndex,
  whereDataContains,
  whereJsonPathMatches,
} from './queries.js';
