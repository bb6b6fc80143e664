/**
 * TandemError - errors owned by a package boundary and composed from facets.
 *
 *   const Storage = TandemError.boundary("storage");
 *   const ErrQueryConsumed = Storage.define("query_consumed", {
 *     customProps: ErrFacet.props<{ table: string }>(),
 *     facets: [InvariantViolated],
 *     message: (d) => `Query on '${d.table}' was already executed`,
 *   });
 *   throw ErrQueryConsumed.create({ table: "users" });
 *
 * Data facets type what an error carries; every facet contributes its name.
 * A cause may be any thrown value and is normalised with TandemError.from, so
 * a store failure can keep the driver's error underneath its own.
 */

import util from "node-inspect-extracted";
import {StaticTypeCompanion} from "./companion.js";
import {Inspect} from "./inspect.js";
import type {UnionToIntersection} from "./type-system-utils.js";

// ============================================================================
// Facets
// ============================================================================

export interface MarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface DataFacet<T extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  /** Type carrier only, never set */
  readonly shape?: T;
}

export type AnyFacet = MarkerFacet | DataFacet;

/** Data one definition carries beyond its facets */
export interface CustomProps<T extends Record<string, unknown> = {}> {
  readonly kind: "props";
  readonly shape?: T;
}

export type PropsOf<P> = P extends CustomProps<infer T> ? T : {};

type DataOf<F> = F extends DataFacet<infer T> ? T : {};

/** Intersection of the data every facet in Fs carries */
export type FacetData<Fs extends readonly AnyFacet[]> = UnionToIntersection<DataOf<Fs[number]>>;

export const ErrFacet = StaticTypeCompanion({
  marker(name: string): MarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  data<T extends Record<string, unknown>>(name: string): DataFacet<T> {
    const facet: DataFacet<T> = { kind: "data", name };
    return Object.freeze(facet);
  },

  props<T extends Record<string, unknown>>(): CustomProps<T> {
    return { kind: "props" };
  },
});

// ============================================================================
// Contracts
// ============================================================================

export interface RenderOptions {
  color?: boolean;
  /** Append the outermost error's stack frames */
  stack?: boolean;
}

export interface TandemError<Fs extends readonly AnyFacet[] = readonly AnyFacet[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly facets: readonly string[];
  readonly data: Readonly<Record<string, unknown>> & FacetData<Fs>;
  readonly cause?: TandemError;
  /** One line per error in the cause chain, outermost first */
  render(opts?: RenderOptions): string;
}

export interface ErrorDef<Fs extends readonly AnyFacet[], D extends Record<string, unknown>> {
  readonly code: string;
  readonly domain: string;
  create(data: FacetData<Fs> & D, cause?: unknown): TandemError<Fs>;
  is(err: unknown): err is TandemError<Fs> & { readonly data: FacetData<Fs> & D };
  /** Run fn; whatever it throws or rejects with becomes this error, with the thrown value as cause */
  wrap<T>(data: FacetData<Fs> & D, fn: () => Promise<T>): Promise<T>;
  wrap<T>(data: FacetData<Fs> & D, fn: () => T): T;
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define `<domain>.<code>` */
  define<const Fs extends readonly AnyFacet[], P extends CustomProps = CustomProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: FacetData<Fs> & PropsOf<P>) => string },
  ): ErrorDef<Fs, PropsOf<P>>;
}

// ============================================================================
// Implementation
// ============================================================================

const FOREIGN = "unknown";

class TandemErrorImpl<Fs extends readonly AnyFacet[]> extends Error implements TandemError<Fs> {
  override readonly cause?: TandemError;

  static {
    Inspect(this, (self, opts) => ({
      format: "%s",
      params: [self.render({ color: opts.colors === true, stack: true })],
    }));
  }

  constructor(
    readonly code: string,
    readonly domain: string,
    readonly facets: readonly string[],
    readonly data: Readonly<Record<string, unknown>> & FacetData<Fs>,
    message: string,
    cause?: TandemError,
  ) {
    super(message);
    this.name = "TandemError";
    if (cause) this.cause = cause;
  }

  render(opts: RenderOptions = {}): string {
    const red = opts.color ? "\x1b[31m" : "";
    const dim = opts.color ? "\x1b[2m" : "";
    const reset = opts.color ? "\x1b[0m" : "";

    const lines: string[] = [];
    let current: TandemError | undefined = this;
    for (let depth = 0; current; depth++, current = current.cause) {
      const lead = depth === 0 ? "" : `${"  ".repeat(depth)}${dim}caused by${reset} `;
      lines.push(`${lead}${red}${current.code}${reset}: ${current.message}${describe(current, dim, reset)}`);
    }

    if (opts.stack) {
      for (const frame of (this.stack ?? "").split("\n")) {
        if (frame.startsWith("    at ")) lines.push(`${dim}${frame}${reset}`);
      }
    }
    return lines.join("\n");
  }
}

/** Facet names and data, e.g. ` [NotAvailable, HasStore] { store: 'local' }` */
function describe(err: TandemError, dim: string, reset: string): string {
  let out = "";
  if (err.facets.length > 0) out += ` ${dim}[${err.facets.join(", ")}]${reset}`;
  if (Object.keys(err.data).length > 0) {
    out += ` ${dim}${util.inspect(err.data, { breakLength: Infinity, compact: true })}${reset}`;
  }
  return out;
}

function fromThrown(thrown: unknown): TandemError {
  if (thrown instanceof TandemErrorImpl) return thrown;
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  const err = new TandemErrorImpl<readonly []>(FOREIGN, FOREIGN, [], {}, message);
  if (thrown instanceof Error && thrown.stack) err.stack = thrown.stack;
  return err;
}

class ErrorDefImpl<Fs extends readonly AnyFacet[], D extends Record<string, unknown>> implements ErrorDef<Fs, D> {
  constructor(
    readonly code: string,
    readonly domain: string,
    private readonly facets: readonly string[],
    private readonly message: (data: FacetData<Fs> & D) => string,
  ) {}

  create = (data: FacetData<Fs> & D, cause?: unknown): TandemError<Fs> => {
    const err = new TandemErrorImpl<Fs>(
      this.code,
      this.domain,
      this.facets,
      { ...data },
      this.message(data),
      cause === undefined ? undefined : fromThrown(cause),
    );
    Error.captureStackTrace(err, this.create);
    return err;
  };

  is(err: unknown): err is TandemError<Fs> & { readonly data: FacetData<Fs> & D } {
    return err instanceof TandemErrorImpl && err.code === this.code;
  }

  wrap<T>(data: FacetData<Fs> & D, fn: () => Promise<T>): Promise<T>;
  wrap<T>(data: FacetData<Fs> & D, fn: () => T): T;
  wrap(data: FacetData<Fs> & D, fn: () => unknown): unknown {
    const fail = (thrown: unknown): never => {
      throw this.create(data, thrown);
    };
    try {
      const result = fn();
      return result instanceof Promise ? result.catch(fail) : result;
    } catch (thrown) {
      return fail(thrown);
    }
  }
}

// ============================================================================
// Companion
// ============================================================================

export const TandemError = StaticTypeCompanion({
  boundary(domain: string): ErrorBoundary {
    return {
      domain,
      define<const Fs extends readonly AnyFacet[], P extends CustomProps = CustomProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: FacetData<Fs> & PropsOf<P>) => string },
      ): ErrorDef<Fs, PropsOf<P>> {
        const facets = Object.freeze(opts.facets.map((f) => f.name));
        return new ErrorDefImpl<Fs, PropsOf<P>>(`${domain}.${code}`, domain, facets, opts.message);
      },
    };
  },

  /** The value itself when it is a TandemError, otherwise an `unknown`-coded one keeping its message and stack */
  from(thrown: unknown): TandemError {
    return fromThrown(thrown);
  },
});
