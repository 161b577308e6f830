/**
 * packages/core/src/container/types.ts — Container tree and configuration record.
 *
 * Why: A container is a node of a strictly binary layout tree. It either
 * holds two child containers or (at most) one widget. Its configuration is
 * split into three scopes:
 *
 *   - local: belongs to this container only
 *   - inherited: value-copied from the parent when the container is created,
 *     independent afterwards
 *   - global: one record per tree, shared by reference with every container
 *
 * Focus is tracked by instance id in the shared tree context, never by an
 * owning reference.
 */

import type { Spacing } from "../layout/spacing.js";
import type { Rect, SplitAxis } from "../layout/types.js";
import type { Color, HorizontalAlign, LineStyle, VerticalAlign } from "../style.js";

/** Keyboard key token. Compared by value only. */
export type Key = string | number;

/** Focus group tag, a non-negative integer. */
export type FocusGroup = number;

/** Opaque widget handle stored on leaves. */
export type Widget = object;

export type InheritedOptions = {
  borderColor: Color;
  focusedColor: Color;
  titleColor: Color | null;
  titleFocusedColor: Color | null;
};

/**
 * Options with a single value across the whole tree.
 * Group maps keep insertion order: keys in configuration order, and groups
 * in the order they were first attached to a key.
 */
export type GlobalOptions = {
  keyFocusNext: Key | null;
  keyFocusPrevious: Key | null;
  keyFocusGroupsNext: Map<Key, Set<FocusGroup>>;
  keyFocusGroupsPrevious: Map<Key, Set<FocusGroup>>;
};

export type ContainerOptions = {
  /** User identifier; "" when none was set. */
  id: string;
  inherited: InheritedOptions;
  global: GlobalOptions;

  split: SplitAxis | null;
  splitPercent: number;
  /** Negative when unset. */
  splitFixed: number;
  splitReversed: boolean;

  hAlign: HorizontalAlign;
  vAlign: VerticalAlign;

  border: LineStyle;
  borderTitle: string;
  borderTitleAlign: HorizontalAlign;

  margin: Spacing;
  padding: Spacing;

  keyFocusSkip: boolean;
  keyFocusGroups: FocusGroup[];
};

/** State shared by every container of one tree. */
export type TreeContext = {
  nextInstanceId: number;
  /** Instance id of the focused container. */
  focusedId: number;
};

/**
 * Rectangles computed for a container by the last successful resolution.
 *
 *   - area: the rectangle allotted by the parent
 *   - box: area minus margin, where the border is drawn
 *   - inner: box minus the border
 *   - content: inner minus padding for widget leaves, otherwise inner
 */
export type ContainerLayout = Readonly<{
  area: Rect;
  box: Rect;
  inner: Rect;
  content: Rect;
}>;

export type Container = {
  readonly instanceId: number;
  readonly tree: TreeContext;
  opts: ContainerOptions;
  first: Container | null;
  second: Container | null;
  widget: Widget | null;
  /** null until resolved, or when this subtree failed to resolve. */
  layout: ContainerLayout | null;
};
