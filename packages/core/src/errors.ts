/**
 * packages/core/src/errors.ts — Structured failures for configuration and geometry.
 *
 * Why: Every failure in the container core is returned as a value. Callers get
 * a discriminated `ok`/`fatal` result, and can convert a fatal into a thrown
 * `TesselError` at their own boundary if they prefer exceptions.
 */

/**
 * Deterministic failure codes.
 *
 *   - TSL_INVALID_OPTION: option argument out of range
 *   - TSL_SPLIT_CONFLICT: percentage and fixed split sizing on one container
 *   - TSL_SPACING_CONFLICT: cells and percentage on the same margin/padding side
 *   - TSL_KEY_CONFLICT: key mapped to both next and previous focus groups
 *   - TSL_DUPLICATE_ID: container identifier used twice in one tree
 *   - TSL_NOT_FOUND: no container with the requested identifier
 *   - TSL_GEOMETRY: a rectangle would shrink below zero size
 */
export type TesselErrorCode =
  | "TSL_INVALID_OPTION"
  | "TSL_SPLIT_CONFLICT"
  | "TSL_SPACING_CONFLICT"
  | "TSL_KEY_CONFLICT"
  | "TSL_DUPLICATE_ID"
  | "TSL_NOT_FOUND"
  | "TSL_GEOMETRY";

export type TesselErrorKind = "configuration" | "geometry";

export type TesselFatal = Readonly<{
  kind: TesselErrorKind;
  code: TesselErrorCode;
  detail: string;
  /** Identifier of the offending container, when it has one. */
  containerId?: string;
  /** The rejected argument. */
  value?: number | string;
  /** Individual problems when several were collected in one pass. */
  causes?: readonly TesselFatal[];
}>;

export type TesselResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: TesselFatal }>;

type FatalContext = Readonly<{ containerId?: string; value?: number | string }>;

export function ok<T>(value: T): TesselResult<T> {
  return { ok: true, value };
}

/** Shared success value for mutations that produce nothing. */
export const OK: TesselResult<void> = Object.freeze({ ok: true, value: undefined });

function withContext(fatal: TesselFatal, ctx: FatalContext | undefined): TesselFatal {
  if (ctx === undefined) return fatal;
  let out: TesselFatal = fatal;
  if (ctx.containerId !== undefined && ctx.containerId !== "") {
    out = { ...out, containerId: ctx.containerId };
  }
  if (ctx.value !== undefined) out = { ...out, value: ctx.value };
  return out;
}

export function configFatal(
  code: Exclude<TesselErrorCode, "TSL_GEOMETRY">,
  detail: string,
  ctx?: FatalContext,
): TesselFatal {
  return withContext({ kind: "configuration", code, detail }, ctx);
}

export function geometryFatal(detail: string, ctx?: FatalContext): TesselFatal {
  return withContext({ kind: "geometry", code: "TSL_GEOMETRY", detail }, ctx);
}

export function fail<T>(fatal: TesselFatal): TesselResult<T> {
  return { ok: false, fatal };
}

/**
 * Fold several problems into one fatal.
 * The first problem decides kind and code; details are joined with "; ".
 */
export function aggregateFatals(problems: readonly TesselFatal[]): TesselFatal | null {
  const first = problems[0];
  if (first === undefined) return null;
  if (problems.length === 1) return first;
  return {
    kind: first.kind,
    code: first.code,
    detail: problems.map((p) => p.detail).join("; "),
    causes: Object.freeze([...problems]),
  };
}

/**
 * Error class for callers that prefer exceptions.
 * The core itself never throws this; see `toError`.
 */
export class TesselError extends Error {
  override readonly name = "TesselError";
  readonly code: TesselErrorCode;
  readonly kind: TesselErrorKind;
  readonly containerId: string | undefined;

  constructor(fatal: TesselFatal) {
    super(fatal.detail);
    this.code = fatal.code;
    this.kind = fatal.kind;
    this.containerId = fatal.containerId;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TesselError);
    }
  }
}

export function toError(fatal: TesselFatal): TesselError {
  return new TesselError(fatal);
}
