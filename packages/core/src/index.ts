/**
 * @tandem/core - Entity model, error system and store contracts for Tandem
 */

// Error system (TandemError and ErrFacet are both type and value)
export { TandemError, ErrFacet } from "./tandem-error.js";
export type { MarkerFacet, DataFacet, AnyFacet, CustomProps, PropsOf, FacetData, ErrorDef, ErrorBoundary, RenderOptions } from "./tandem-error.js";

// Standard facets and error definitions
export * from "./errors/errors.js";

// Logging
export { Logger, LogLevels, stderrSink } from "./logger.js";
export type { LogLevel, LogSink, LoggerOptions } from "./logger.js";

// Lifecycle
export { LifecycleManager } from "./lifecycle.js";
export type { Lifecycle, LifecycleMethods, LifecycleStep } from "./lifecycle.js";

// Temporal values
export { Timestamp, CANONICAL_FORMAT } from "./timestamp.js";

// Casts (Cast is the companion of CastKind)
export { Cast, CastKinds } from "./casts.js";
export type { CastKind, CastTarget } from "./casts.js";

// Attribute store
export { AttributeStore, plainSnapshot } from "./attribute-store.js";
export type { Snapshotter } from "./attribute-store.js";

// Entity model
export { EntityDef } from "./entity-def.js";
export type { EntityDefOptions, Accessor, TimestampColumns } from "./entity-def.js";
export { Relation } from "./relation.js";
export type { OneRelation, ManyRelation, RelationMap } from "./relation.js";
export { Entity } from "./entity.js";
export type { Timestamped } from "./entity.js";

// Store contracts
export { Transaction } from "./local-store.js";
export type { ExecResult, LocalStore, Row, SqlValue, Statement } from "./local-store.js";
export type { RemoteResource, RequestOptions, FilterValue } from "./remote-resource.js";
export { ResourceResponse } from "./resource-response.js";
export type { ResourceResponseInit } from "./resource-response.js";
export { Envelope } from "./envelope.js";

// Utilities
export { isPlainObject, isKeyValue } from "./plain.js";
export type { KeyValue } from "./plain.js";
export { StaticTypeCompanion } from "./companion.js";
export { Inspect, inspect } from "./inspect.js";
export type { InspectRendering } from "./inspect.js";
export type { Constructor, UnionToIntersection } from "./type-system-utils.js";
