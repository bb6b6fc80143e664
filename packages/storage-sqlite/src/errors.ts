/**
 * Storage boundary — domain-owned errors for @tandem/storage-sqlite.
 */

import {TandemError, ErrFacet, BadInput, InvariantViolated} from "@tandem/core";

// ============================================================================
// Boundary
// ============================================================================

export const Storage = TandemError.boundary("storage");

// ============================================================================
// Errors
// ============================================================================

/** A builder was used after its terminal operation ran */
export const ErrQueryConsumed = Storage.define("query_consumed", {
  customProps: ErrFacet.props<{ table: string }>(),
  facets: [InvariantViolated],
  message: (d) => `Query on '${d.table}' was already executed; start a new builder`,
});

export const ErrInvalidOperator = Storage.define("invalid_operator", {
  customProps: ErrFacet.props<{ operator: string }>(),
  facets: [BadInput],
  message: (d) => `Unsupported comparison operator '${d.operator}'`,
});

/** Table and column names are inlined, so only plain identifiers are accepted */
export const ErrInvalidIdentifier = Storage.define("invalid_identifier", {
  customProps: ErrFacet.props<{ identifier: string }>(),
  facets: [BadInput],
  message: (d) => `'${d.identifier}' is not a valid table or column name`,
});

/** Limit, offset or direction out of range */
export const ErrInvalidLimit = Storage.define("invalid_limit", {
  customProps: ErrFacet.props<{ clause: string; value: unknown }>(),
  facets: [BadInput],
  message: (d) => `Invalid ${d.clause}: ${String(d.value)}`,
});

export const ErrTransactionState = Storage.define("transaction_state", {
  customProps: ErrFacet.props<{ action: "begin" | "commit" | "rollback" }>(),
  facets: [InvariantViolated],
  message: (d) => d.action === "begin"
    ? "Cannot begin: a transaction is already open"
    : `Cannot ${d.action}: no transaction is open`,
});
