/**
 * packages/core/src/style.ts — Color and alignment tokens stored by containers.
 *
 * The core never draws, so these are compared by value and handed on to the
 * renderer untouched.
 */

/** Packed RGB color (0x00RRGGBB). Value 0 is reserved as the terminal-default sentinel. */
export type Rgb24 = number;

export type Color = Rgb24;

/** The terminal's own default color. */
export const DEFAULT_COLOR: Color = 0;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. Note: `rgb(0, 0, 0)` encodes sentinel `0`. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export type HorizontalAlign = "left" | "center" | "right";
export type VerticalAlign = "top" | "middle" | "bottom";

/** Border line styles understood by the renderer. */
export type LineStyle =
  | "none"
  | "single"
  | "double"
  | "rounded"
  | "heavy"
  | "dashed"
  | "heavy-dashed";
