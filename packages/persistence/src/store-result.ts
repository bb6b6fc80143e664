/**
 * StoreResult - the outcome of one call into a store, as a value.
 *
 * The coordinator never lets a store's exception escape; it matches on these
 * instead and falls back or reports false.
 */

import {ErrStoreUnavailable, StaticTypeCompanion, type Logger, type TandemError} from "@tandem/core";

export type StoreName = "local" | "remote";

export type StoreResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: TandemError };

export interface AttemptContext {
  readonly store: StoreName;
  readonly entityType: string;
  readonly operation: string;
  readonly logger: Logger;
}

export const StoreResult = StaticTypeCompanion({
  ok<T>(value: T): StoreResult<T> {
    return { ok: true, value };
  },

  fail<T>(error: TandemError): StoreResult<T> {
    return { ok: false, error };
  },

  /** Run fn; a throw becomes core.store_unavailable (logged at warn) with the thrown value as cause */
  async attempt<T>(ctx: AttemptContext, fn: () => Promise<T>): Promise<StoreResult<T>> {
    try {
      return StoreResult.ok(await fn());
    } catch (thrown) {
      const error = ErrStoreUnavailable.create(
        { store: ctx.store, entityType: ctx.entityType, operation: ctx.operation },
        thrown,
      );
      ctx.logger.warn(error.message, error);
      return StoreResult.fail(error);
    }
  },
});
