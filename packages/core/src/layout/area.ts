/**
 * packages/core/src/layout/area.ts — Pure rectangle arithmetic.
 *
 * Shrinking never clamps: a request that would leave a negative width or
 * height is a geometry failure the caller must handle.
 */

import { type TesselResult, fail, geometryFatal, ok } from "../errors.js";
import type { Rect } from "./types.js";

export function rect(x: number, y: number, w: number, h: number): Rect {
  return Object.freeze({ x, y, w, h });
}

function isNonNegativeInt(v: number): boolean {
  return Number.isInteger(v) && v >= 0;
}

/** Shrink each side by a fixed number of cells. */
export function shrink(
  area: Rect,
  top: number,
  right: number,
  bottom: number,
  left: number,
): TesselResult<Rect> {
  for (const v of [top, right, bottom, left]) {
    if (!isNonNegativeInt(v)) {
      return fail(geometryFatal(`invalid shrink amount ${String(v)}, must be an integer >= 0`));
    }
  }
  const w = area.w - left - right;
  const h = area.h - top - bottom;
  if (w < 0 || h < 0) {
    return fail(
      geometryFatal(
        `cannot shrink ${formatRect(area)} by top=${top} right=${right} bottom=${bottom} left=${left}: result would be ${w}x${h}`,
      ),
    );
  }
  return ok(rect(area.x + left, area.y + top, w, h));
}

/** Cells taken by `percent` of `length`, rounded down. */
export function percentOf(length: number, percent: number): number {
  return Math.floor((length * percent) / 100);
}

/**
 * Shrink each side by a percentage of the rectangle's height (top/bottom)
 * or width (left/right). Percentages must be in 0..100.
 */
export function shrinkPercent(
  area: Rect,
  topPerc: number,
  rightPerc: number,
  bottomPerc: number,
  leftPerc: number,
): TesselResult<Rect> {
  for (const v of [topPerc, rightPerc, bottomPerc, leftPerc]) {
    if (!Number.isInteger(v) || v < 0 || v > 100) {
      return fail(geometryFatal(`invalid shrink percentage ${String(v)}, must be in 0..100`));
    }
  }
  return shrink(
    area,
    percentOf(area.h, topPerc),
    percentOf(area.w, rightPerc),
    percentOf(area.h, bottomPerc),
    percentOf(area.w, leftPerc),
  );
}

/** Remove a one-cell border from every side. */
export function excludeBorder(area: Rect): TesselResult<Rect> {
  return shrink(area, 1, 1, 1, 1);
}

export function formatRect(r: Rect): string {
  return `(${r.x},${r.y} ${r.w}x${r.h})`;
}
