/**
 * @tandem/storage-sqlite - SQL grammar, query builder and SQLite local store
 */

export { SqliteLocalStore } from "./sqlite-store.js";
export type { SqliteLocalStoreOptions } from "./sqlite-store.js";
export { QueryBuilder } from "./query-builder.js";
export { SqliteGrammar } from "./grammar.js";
export type { ComparisonOperator, Operator, Direction, WhereClause, OrderClause, QuerySpec } from "./grammar.js";
export { toSqlValue, toSqlValues } from "./values.js";

// Errors
export { Storage, ErrQueryConsumed, ErrInvalidOperator, ErrInvalidIdentifier, ErrInvalidLimit, ErrTransactionState } from "./errors.js";
