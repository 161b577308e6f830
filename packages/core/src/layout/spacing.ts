/**
 * packages/core/src/layout/spacing.ts — Margin and padding records.
 *
 * Why: Each side of a margin or padding is configured independently, either
 * in absolute cells or as a percentage of the relevant dimension (height for
 * top/bottom, width for left/right). A side holds at most one of the two.
 */

import { type TesselResult, fail, geometryFatal } from "../errors.js";
import { percentOf, shrink } from "./area.js";
import type { Rect, Side } from "./types.js";

export type SpacingUnit = "cells" | "percent";

/** Value of one side; null when the side is not configured. */
export type SpacingValue = Readonly<{ unit: SpacingUnit; value: number }> | null;

export type Spacing = Readonly<Record<Side, SpacingValue>>;

export const EMPTY_SPACING: Spacing = Object.freeze({
  top: null,
  right: null,
  bottom: null,
  left: null,
});

export function withSide(spacing: Spacing, side: Side, value: SpacingValue): Spacing {
  return Object.freeze({ ...spacing, [side]: value });
}

function sideCells(value: SpacingValue, length: number): number {
  if (value === null) return 0;
  return value.unit === "cells" ? value.value : percentOf(length, value.value);
}

/** Cells consumed on each side when the spacing is applied to `area`. */
export function resolveSpacing(spacing: Spacing, area: Rect): Readonly<Record<Side, number>> {
  return {
    top: sideCells(spacing.top, area.h),
    right: sideCells(spacing.right, area.w),
    bottom: sideCells(spacing.bottom, area.h),
    left: sideCells(spacing.left, area.w),
  };
}

export function isEmptySpacing(spacing: Spacing): boolean {
  return (
    spacing.top === null && spacing.right === null && spacing.bottom === null && spacing.left === null
  );
}

/**
 * Shrink `area` by the spacing. Percentages are taken of the original
 * dimensions, not of the partially shrunk rectangle.
 */
export function applySpacing(spacing: Spacing, area: Rect, label: string): TesselResult<Rect> {
  if (isEmptySpacing(spacing)) return { ok: true, value: area };
  const cells = resolveSpacing(spacing, area);
  const res = shrink(area, cells.top, cells.right, cells.bottom, cells.left);
  if (res.ok) return res;
  return fail(geometryFatal(`${label} does not fit: ${res.fatal.detail}`));
}

export function formatSpacingValue(value: SpacingValue): string {
  if (value === null) return "unset";
  return value.unit === "cells" ? `${value.value} cells` : `${value.value}%`;
}
