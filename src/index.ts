export { Op, opToSql, isExistenceOp } from './query/op.js';
export type { ComparisonOp, ExistenceOp } from './query/op.js';
export { Field, field, isComparison } from './query/field.js';
export type { ComparisonCriterion, ExistenceCriterion, FieldCriterion, FieldValue } from './query/field.js';
export {
  DocumentQueries,
  countAll,
  ensureIndexOn,
  ensureTableFor,
  insert,
  selectFromTable,
  tableOnly,
  whereByField,
} from './query/common.js';
export { fieldParams, idParam, jsonParam, noParams } from './query/parameters.js';
export { DEFAULT_ID_FIELD, jsonSerializer, resolveConfig } from './config.js';
export type {
  DocumentConfig,
  DocumentId,
  DocumentOptions,
  DocumentSerializer,
  DocumentStore,
  Parameters,
  QueryResult,
  Row,
  SqlConnection,
  SqlValue,
  ValueRenderer,
} from './types.js';
export { CustomQueries } from './store/custom.js';
export { SqlDocumentStore } from './store/document-store.js';
export { bindPositional } from './store/bind.js';
export type { PositionalQuery } from './store/bind.js';
export { fromData, fromDocument, toCount, toExists } from './store/row-mapper.js';
export type { RowMapper } from './store/row-mapper.js';
export { InvalidArgumentError, QueryError } from './errors.js';
