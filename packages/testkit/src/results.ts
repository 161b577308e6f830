/**
 * packages/testkit/src/results.ts — Unwrapping helpers for `ok`/`fatal` results.
 *
 * Core APIs report failures as values instead of throwing. Tests mostly care
 * about one side of the union, so these helpers assert the expected side and
 * hand back its payload with the union already narrowed.
 */
import { strict as assert } from "node:assert";

/** Failure payload shape shared by core result types. */
export type FailureLike = Readonly<{ code: string; detail: string }>;

export type ResultLike<T, F extends FailureLike> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: F }>;

/** Assert success and return the value. */
export function mustOk<T, F extends FailureLike>(res: ResultLike<T, F>, label = "result"): T {
  if (!res.ok) {
    assert.fail(`${label} failed: ${res.fatal.code}: ${res.fatal.detail}`);
  }
  return res.value;
}

/** Assert failure and return the fatal payload. */
export function mustFail<T, F extends FailureLike>(res: ResultLike<T, F>, label = "result"): F {
  if (res.ok) {
    assert.fail(`${label} unexpectedly succeeded`);
  }
  return res.fatal;
}

/** Assert a value is neither null nor undefined and return it. */
export function mustExist<T>(value: T | null | undefined, label = "value"): T {
  if (value === null || value === undefined) {
    assert.fail(`${label} is missing`);
  }
  return value;
}
