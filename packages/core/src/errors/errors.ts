/**
 * Standard facets and domain-owned error definitions for the core boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 * The storage, remote and platform packages define their own boundaries on top of these.
 */

import {ErrFacet, TandemError} from "../tandem-error.js";

// ============================================================================
// Core Boundary
// ============================================================================

export const Core = TandemError.boundary("core");

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** A backing store or service could not serve the request */
export const NotAvailable = ErrFacet.marker("NotAvailable");

/** Stored data could not be decoded into its declared shape */
export const DecodeFailure = ErrFacet.marker("DecodeFailure");

/** Internal invariant or wiring violated, always a bug in the caller's setup */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** Carries an entity type name */
export const HasEntityType = ErrFacet.data<{ entityType: string }>("HasEntityType");

/** Carries an entity type + field name */
export const HasField = ErrFacet.data<{ entityType: string; field: string }>("HasField");

/** Carries the store that failed */
export const HasStore = ErrFacet.data<{ store: "local" | "remote" }>("HasStore");

// ============================================================================
// Standard Error Definitions
// ============================================================================

/** A json-cast attribute holds text that is not valid JSON */
export const ErrDecodeFailed = Core.define("decode_failed", {
  facets: [DecodeFailure, HasField],
  message: (d) => `Cannot decode '${d.field}' on ${d.entityType} as JSON`,
});

/** A configured store threw while serving an operation */
export const ErrStoreUnavailable = Core.define("store_unavailable", {
  customProps: ErrFacet.props<{ operation: string }>(),
  facets: [NotAvailable, HasStore, HasEntityType],
  message: (d) => `The ${d.store} store failed during ${d.operation} of ${d.entityType}`,
});

/** An operation needs a store that was not provided */
export const ErrNotConfigured = Core.define("not_configured", {
  customProps: ErrFacet.props<{ requirement: string }>(),
  facets: [InvariantViolated, HasEntityType],
  message: (d) => `${d.entityType} needs ${d.requirement}, which is not configured`,
});
