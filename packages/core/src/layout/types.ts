/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Rectangles handed from parent to child during resolution, the two split
 * axes and the four sides margin and padding are configured on. Units are
 * terminal cells.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/**
 * Split axis.
 *   - "vertical": divider runs top to bottom; first = left, second = right
 *   - "horizontal": divider runs left to right; first = top, second = bottom
 */
export type SplitAxis = "vertical" | "horizontal";

/** One of the four sides of a rectangle. */
export type Side = "top" | "right" | "bottom" | "left";
