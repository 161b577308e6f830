/**
 * packages/core/src/layout/split.ts — Two-way split arithmetic.
 *
 * Sizing rules for an axis of length L:
 *   - fixed cells c (c >= 0): size = min(c, L)
 *   - percentage p (0 < p < 100): size = round(L * p / 100)
 *   - first = size, second = L - size; swapped when reversed
 *
 * first + second === L always holds; either side may be zero.
 */

import { rect } from "./area.js";
import type { Rect, SplitAxis } from "./types.js";

export type SplitSizing = Readonly<{
  /** Percentage applied when `fixed` is unset. */
  percent: number;
  /** Fixed cell count; negative means unset. */
  fixed: number;
  /** Apply the size to the second side instead of the first. */
  reversed: boolean;
}>;

/** Split one axis length into [first, second]. */
export function splitLength(length: number, sizing: SplitSizing): readonly [number, number] {
  const total = Math.max(0, length);
  const size =
    sizing.fixed >= 0
      ? Math.min(sizing.fixed, total)
      : Math.round((total * sizing.percent) / 100);
  const rest = total - size;
  return sizing.reversed ? [rest, size] : [size, rest];
}

/**
 * Split `area` along `axis`. The two rectangles are disjoint and cover `area`
 * exactly.
 */
export function splitRect(
  area: Rect,
  axis: SplitAxis,
  sizing: SplitSizing,
): readonly [Rect, Rect] {
  if (axis === "vertical") {
    const [firstW, secondW] = splitLength(area.w, sizing);
    return [rect(area.x, area.y, firstW, area.h), rect(area.x + firstW, area.y, secondW, area.h)];
  }
  const [firstH, secondH] = splitLength(area.h, sizing);
  return [rect(area.x, area.y, area.w, firstH), rect(area.x, area.y + firstH, area.w, secondH)];
}
