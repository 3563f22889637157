/**
 * DroverError - Composable error system with facets and boundaries.
 *
 * Errors are composed from facets (marker traits and data traits) instead of
 * class inheritance. Three discrimination axes: exact type (code), facet, domain.
 *
 * A boundary owns a domain. Errors defined through `boundary.define()` get a
 * code prefixed with that domain, so `deployment.unknown_deployment` and
 * `workload.unknown_workload` can never be confused.
 */

import * as util from "node:util";
import {StaticTypeCompanion} from "./companion.js";
import type {UnionToIntersection} from "./type-system-utils.js";

// ============================================================================
// Facet Types
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends object = object> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom type for compile-time inference
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet<object>;

/** Phantom type carrier for error-local custom props */
export interface ErrProps<T extends object = EmptyProps> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

export type EmptyProps = Record<never, never>;

/** Extract the data type from an ErrProps */
export type InferPropsData<P> = P extends ErrProps<infer T extends object> ? T : EmptyProps;

// ============================================================================
// Facet Companion
// ============================================================================

export const ErrFacet = StaticTypeCompanion({
  /** Create a marker facet (no associated data) */
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  /** Create a data facet with typed associated data */
  data<TData extends object>(name: string): ErrDataFacet<TData> {
    return Object.freeze({ kind: "data" as const, name });
  },

  /** Declare error-local custom props (phantom type only) */
  props<T extends object>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

// ============================================================================
// Type Utilities
// ============================================================================

/** Extract the data type from a facet. Markers contribute nothing */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : EmptyProps;

/** Merge data types from a tuple of facets into a single intersection */
export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
> & EmptyProps;

// ============================================================================
// DroverError Interface
// ============================================================================

export interface DroverError<D = unknown> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: D;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: DroverError;
  toJSON(): DroverErrorJSON;
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

export interface DroverErrorJSON {
  code: string;
  domain: string;
  message: string;
  context?: string;
  data: unknown;
  facets: string[];
  stack?: string;
  cause?: DroverErrorJSON;
}

// ============================================================================
// ErrorDef / ErrorBoundary
// ============================================================================

export interface ErrorDef<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[], D extends object = EmptyProps> {
  readonly code: string;
  readonly domain: string;
  readonly facets: Fs;
  create(data: MergeFacetProps<Fs> & D, context?: string, cause?: DroverError): DroverError<MergeFacetProps<Fs> & D>;
  is(err: unknown): err is DroverError<MergeFacetProps<Fs> & D>;
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error within this boundary. Code is prefixed with the domain. */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps<object> = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  /** Check if an error belongs to this boundary's domain */
  is(err: unknown): err is DroverError;
}

// ============================================================================
// Helpers
// ============================================================================

/** Stack frames only: the message line and the internal create() frame are stripped */
function stackFrames(stack: string | undefined): string {
  if (!stack) return "";
  const first = stack.indexOf("\n    at ");
  if (first === -1) return "";
  const secondFrame = stack.indexOf("\n    at ", first + 1);
  if (secondFrame !== -1 && stack.slice(first, secondFrame).includes("at create (")) {
    return stack.slice(secondFrame + 1);
  }
  return stack.slice(first + 1);
}

/** Convert any thrown value to a DroverError, preserving stack */
function asDroverError(thrown: unknown): DroverError {
  if (thrown instanceof DroverErrorImpl) return thrown;
  const message = thrown instanceof Error ? thrown.message : typeof thrown === "string" ? thrown : String(thrown);
  const wrapped = new DroverErrorImpl<unknown>("unknown", "unknown", message, new Set<string>(), {});
  if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
  return wrapped;
}

function hasKeys(data: unknown): data is object {
  return typeof data === "object" && data !== null && Object.keys(data).length > 0;
}

// ============================================================================
// DroverError Implementation (internal)
// ============================================================================

class DroverErrorImpl<D> extends Error implements DroverError<D> {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: D;
  readonly facetNames: ReadonlySet<string>;
  override readonly cause?: DroverError;

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: D,
    context?: string,
    cause?: DroverError,
  ) {
    super(context ? `${message} (${context})` : message);
    this.name = `DroverError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.context = context;
    this.data = data;
    this.facetNames = facetNames;
    if (cause) this.cause = cause;
  }

  [util.inspect.custom](_depth: number, options: util.InspectOptionsStylized): string {
    return this.prettyPrint({ color: options.colors, includeStackTrace: true });
  }

  toJSON(): DroverErrorJSON {
    const json: DroverErrorJSON = {
      code: this.code,
      domain: this.domain,
      message: this.message,
      data: this.data,
      facets: [...this.facetNames],
      stack: this.stack,
    };
    if (this.context !== undefined) {
      json.context = this.context;
    }
    if (this.cause) {
      json.cause = this.cause.toJSON();
    }
    return json;
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const color = opts?.color ?? false;
    const includeStack = opts?.includeStackTrace ?? false;

    const c = {
      red: color ? "\x1b[31m" : "",
      dim: color ? "\x1b[2m" : "",
      reset: color ? "\x1b[0m" : "",
    };

    const lines: string[] = [];
    lines.push(`DroverError: ` + formatErrorLine(this, "", c, !this.cause));

    let current: DroverError | undefined = this.cause;
    let indent = "  ";
    while (current) {
      lines.push(`${indent}${c.dim}└ caused by:${c.reset} ${formatErrorLine(current, indent, c, !current.cause)}`);
      current = current.cause;
      indent += "  ";
    }

    if (includeStack) {
      const frames = stackFrames(this.stack);
      if (frames) {
        lines.push(`  ${c.dim}➝ Stack trace:${c.reset}`);
        for (const frame of frames.split("\n")) {
          if (frame.trim()) lines.push(`${c.dim}${frame}${c.reset}`);
        }
      }
    }

    return lines.join("\n");
  }
}

function formatErrorLine(
  err: DroverError,
  indent: string,
  c: { red: string; dim: string; reset: string },
  isLast: boolean,
): string {
  let line = `${c.red}${err.code}${c.reset}: ${err.message}`;
  if (hasKeys(err.data)) {
    const connectorChar = isLast ? "└" : "├";
    line += `\n${indent}  ${c.dim}${connectorChar} data: ${JSON.stringify(err.data)}${c.reset}`;
  }
  return line;
}

// ============================================================================
// Internal: create an ErrorDef
// ============================================================================

function defineError<const Fs extends readonly ErrFacetAny[], D extends object>(
  fullCode: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames: ReadonlySet<string> = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: MergeFacetProps<Fs> & D, context?: string, cause?: DroverError): DroverError<MergeFacetProps<Fs> & D> {
    const err = new DroverErrorImpl(fullCode, domain, opts.message(data), facetNames, data, context, cause);
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code: fullCode,
    domain,
    facets: opts.facets,
    create,
    is(err: unknown): err is DroverError<MergeFacetProps<Fs> & D> {
      return err instanceof DroverErrorImpl && err.code === fullCode;
    },
  });
}

// ============================================================================
// DroverError Companion
// ============================================================================

export const DroverError = StaticTypeCompanion({
  /**
   * Create an error boundary for a domain.
   * Errors defined via the boundary are prefixed with the domain:
   *
   *   const Deployment = DroverError.boundary("deployment");
   *   const ErrUnknownDeployment = Deployment.define("unknown_deployment", {...});
   */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,

      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps<object> = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
      ): ErrorDef<Fs, InferPropsData<P>> {
        return defineError<Fs, InferPropsData<P>>(`${domain}.${code}`, domain, opts);
      },

      is(err: unknown): err is DroverError {
        return err instanceof DroverErrorImpl && err.domain === domain;
      },
    };
  },

  /** Check if a value is any DroverError */
  isDroverError(err: unknown): err is DroverError {
    return err instanceof DroverErrorImpl;
  },

  /**
   * Check if a DroverError has a specific facet.
   * For a data facet, narrows err.data to include its data.
   */
  has<F extends ErrFacetAny>(err: unknown, facet: F): err is DroverError<FacetProps<F>> {
    return err instanceof DroverErrorImpl && err.facetNames.has(facet.name);
  },

  /** Check if a DroverError belongs to a domain */
  inDomain(err: unknown, domain: string): boolean {
    return err instanceof DroverErrorImpl && err.domain === domain;
  },

  /**
   * Convert any value to a DroverError, preserving stack.
   * If already a DroverError, returns it unchanged.
   */
  wrap(err: unknown): DroverError {
    return asDroverError(err);
  },

  /** Message of any thrown value, for records and reports */
  messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
  },
});
