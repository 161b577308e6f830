/**
 * packages/core/src/container/options.ts — Container option variants and factories.
 *
 * Why: Every configuration mutation is a small tagged object. Options carry
 * their raw arguments; range checks happen when an option is applied to a
 * container (see apply.ts), so a list of options can be built, inspected and
 * compared before it touches a tree.
 *
 * Usage:
 *   const root = createContainer(
 *     opt.keyFocusNext("tab"),
 *     opt.splitVertical(
 *       opt.left(opt.id("nav"), opt.placeWidget(nav)),
 *       opt.right(opt.border("single"), opt.placeWidget(body)),
 *       opt.splitFixed(20),
 *     ),
 *   );
 */

import type { SpacingUnit } from "../layout/spacing.js";
import type { Side, SplitAxis } from "../layout/types.js";
import type { Color, HorizontalAlign, LineStyle, VerticalAlign } from "../style.js";
import type { FocusGroup, InheritedOptions, Key, Widget } from "./types.js";

export type SpacingTarget = "margin" | "padding";

export type FocusDirection = "next" | "previous";

/** Sizing options accepted only by the split options. */
export type SplitOption =
  | Readonly<{ kind: "splitPercent"; percent: number; fromEnd: boolean }>
  | Readonly<{ kind: "splitFixed"; cells: number; fromEnd: boolean }>;

export type ContainerOption =
  | Readonly<{ kind: "id"; id: string }>
  | Readonly<{
      kind: "split";
      axis: SplitAxis;
      first: readonly ContainerOption[];
      second: readonly ContainerOption[];
      sizing: readonly SplitOption[];
    }>
  | Readonly<{ kind: "clear" }>
  | Readonly<{ kind: "placeWidget"; widget: Widget }>
  | Readonly<{
      kind: "spacing";
      target: SpacingTarget;
      side: Side;
      unit: SpacingUnit;
      value: number;
    }>
  | Readonly<{ kind: "alignHorizontal"; align: HorizontalAlign }>
  | Readonly<{ kind: "alignVertical"; align: VerticalAlign }>
  | Readonly<{ kind: "border"; style: LineStyle }>
  | Readonly<{ kind: "borderTitle"; title: string }>
  | Readonly<{ kind: "borderTitleAlign"; align: HorizontalAlign }>
  | Readonly<{ kind: "inheritedColor"; field: keyof InheritedOptions; color: Color }>
  | Readonly<{ kind: "keyFocus"; direction: FocusDirection; key: Key }>
  | Readonly<{ kind: "keyFocusSkip" }>
  | Readonly<{ kind: "keyFocusGroups"; groups: readonly FocusGroup[] }>
  | Readonly<{
      kind: "keyFocusGroupsKey";
      direction: FocusDirection;
      key: Key;
      groups: readonly FocusGroup[];
    }>
  | Readonly<{ kind: "focused" }>;

export type ContainerOptionKind = ContainerOption["kind"];

/** Options for one side of a split. The side tag keeps left/right and top/bottom apart. */
export type LeftOptions = Readonly<{ side: "left"; options: readonly ContainerOption[] }>;
export type RightOptions = Readonly<{ side: "right"; options: readonly ContainerOption[] }>;
export type TopOptions = Readonly<{ side: "top"; options: readonly ContainerOption[] }>;
export type BottomOptions = Readonly<{ side: "bottom"; options: readonly ContainerOption[] }>;

function spacing(
  target: SpacingTarget,
  side: Side,
  unit: SpacingUnit,
  value: number,
): ContainerOption {
  return { kind: "spacing", target, side, unit, value };
}

export const opt = {
  /** Identifier used by `update` and `findById`. Must be non-empty and unique in the tree. */
  id(id: string): ContainerOption {
    return { kind: "id", id };
  },

  /**
   * Split into left and right sub containers. Removes any widget; the
   * default sizing gives each side half of the width.
   */
  splitVertical(l: LeftOptions, r: RightOptions, ...sizing: SplitOption[]): ContainerOption {
    return { kind: "split", axis: "vertical", first: l.options, second: r.options, sizing };
  },

  /** Split into top and bottom sub containers. Removes any widget. */
  splitHorizontal(t: TopOptions, b: BottomOptions, ...sizing: SplitOption[]): ContainerOption {
    return { kind: "split", axis: "horizontal", first: t.options, second: b.options, sizing };
  },

  left(...options: ContainerOption[]): LeftOptions {
    return { side: "left", options };
  },
  right(...options: ContainerOption[]): RightOptions {
    return { side: "right", options };
  },
  top(...options: ContainerOption[]): TopOptions {
    return { side: "top", options };
  },
  bottom(...options: ContainerOption[]): BottomOptions {
    return { side: "bottom", options };
  },

  /** Size of the first (left/top) side as a percentage, 0 < p < 100. */
  splitPercent(percent: number): SplitOption {
    return { kind: "splitPercent", percent, fromEnd: false };
  },
  /** Size of the second (right/bottom) side as a percentage, 0 < p < 100. */
  splitPercentFromEnd(percent: number): SplitOption {
    return { kind: "splitPercent", percent, fromEnd: true };
  },
  /** Fixed size of the first side in cells; the second side takes the rest. */
  splitFixed(cells: number): SplitOption {
    return { kind: "splitFixed", cells, fromEnd: false };
  },
  /** Fixed size of the second side in cells; the first side takes the rest. */
  splitFixedFromEnd(cells: number): SplitOption {
    return { kind: "splitFixed", cells, fromEnd: true };
  },

  /** Remove the widget and any sub containers. */
  clear(): ContainerOption {
    return { kind: "clear" };
  },
  /** Place a widget, removing any sub containers. */
  placeWidget(widget: Widget): ContainerOption {
    return { kind: "placeWidget", widget };
  },

  marginTop: (cells: number) => spacing("margin", "top", "cells", cells),
  marginRight: (cells: number) => spacing("margin", "right", "cells", cells),
  marginBottom: (cells: number) => spacing("margin", "bottom", "cells", cells),
  marginLeft: (cells: number) => spacing("margin", "left", "cells", cells),
  marginTopPercent: (perc: number) => spacing("margin", "top", "percent", perc),
  marginRightPercent: (perc: number) => spacing("margin", "right", "percent", perc),
  marginBottomPercent: (perc: number) => spacing("margin", "bottom", "percent", perc),
  marginLeftPercent: (perc: number) => spacing("margin", "left", "percent", perc),

  paddingTop: (cells: number) => spacing("padding", "top", "cells", cells),
  paddingRight: (cells: number) => spacing("padding", "right", "cells", cells),
  paddingBottom: (cells: number) => spacing("padding", "bottom", "cells", cells),
  paddingLeft: (cells: number) => spacing("padding", "left", "cells", cells),
  paddingTopPercent: (perc: number) => spacing("padding", "top", "percent", perc),
  paddingRightPercent: (perc: number) => spacing("padding", "right", "percent", perc),
  paddingBottomPercent: (perc: number) => spacing("padding", "bottom", "percent", perc),
  paddingLeftPercent: (perc: number) => spacing("padding", "left", "percent", perc),

  /** Horizontal alignment of the widget. Defaults to "center". */
  alignHorizontal(align: HorizontalAlign): ContainerOption {
    return { kind: "alignHorizontal", align };
  },
  /** Vertical alignment of the widget. Defaults to "middle". */
  alignVertical(align: VerticalAlign): ContainerOption {
    return { kind: "alignVertical", align };
  },

  border(style: LineStyle): ContainerOption {
    return { kind: "border", style };
  },
  borderTitle(title: string): ContainerOption {
    return { kind: "borderTitle", title };
  },
  borderTitleAlignLeft(): ContainerOption {
    return { kind: "borderTitleAlign", align: "left" };
  },
  borderTitleAlignCenter(): ContainerOption {
    return { kind: "borderTitleAlign", align: "center" };
  },
  borderTitleAlignRight(): ContainerOption {
    return { kind: "borderTitleAlign", align: "right" };
  },

  // Inherited by sub containers created after the option is applied.
  borderColor(color: Color): ContainerOption {
    return { kind: "inheritedColor", field: "borderColor", color };
  },
  focusedColor(color: Color): ContainerOption {
    return { kind: "inheritedColor", field: "focusedColor", color };
  },
  titleColor(color: Color): ContainerOption {
    return { kind: "inheritedColor", field: "titleColor", color };
  },
  titleFocusedColor(color: Color): ContainerOption {
    return { kind: "inheritedColor", field: "titleFocusedColor", color };
  },

  /**
   * Key moving focus to the next leaf in depth-first order, wrapping at the
   * end. Global: applies to the whole tree whichever container sets it.
   */
  keyFocusNext(key: Key): ContainerOption {
    return { kind: "keyFocus", direction: "next", key };
  },
  /** Key moving focus to the previous leaf. Global. */
  keyFocusPrevious(key: Key): ContainerOption {
    return { kind: "keyFocus", direction: "previous", key };
  },
  /**
   * Exclude this container from keyFocusNext/keyFocusPrevious traversal.
   * It can still be focused directly or through focus group keys.
   */
  keyFocusSkip(): ContainerOption {
    return { kind: "keyFocusSkip" };
  },
  /**
   * Add this container to focus groups. Order matters: when a key matches
   * several of the focused container's groups, the first one listed wins.
   * With no arguments the container leaves all groups.
   */
  keyFocusGroups(...groups: FocusGroup[]): ContainerOption {
    return { kind: "keyFocusGroups", groups };
  },
  /** Key moving focus to the next container within the given groups. Global. */
  keyFocusGroupsNext(key: Key, ...groups: FocusGroup[]): ContainerOption {
    return { kind: "keyFocusGroupsKey", direction: "next", key, groups };
  },
  /** Key moving focus to the previous container within the given groups. Global. */
  keyFocusGroupsPrevious(key: Key, ...groups: FocusGroup[]): ContainerOption {
    return { kind: "keyFocusGroupsKey", direction: "previous", key, groups };
  },

  /** Give this container keyboard focus. Last one applied wins. */
  focused(): ContainerOption {
    return { kind: "focused" };
  },
} as const;
