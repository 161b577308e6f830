/**
 * packages/core/src/runtime/focus.ts — Keyboard focus state and traversal.
 *
 * Why: Exactly one container of a tree holds keyboard focus. The tree context
 * records it by instance id; the container itself is looked up on demand, so
 * removing a subtree never leaves a dangling owner.
 *
 * Focus rules:
 *   - Initially the root; the `focused()` option overrides (last write wins)
 *   - Traversal order: depth-first pre-order, first child before second
 *   - Only widget-holding leaves receive focus through traversal; the walk
 *     starts from the focused container's own position, so a focused split
 *     container hands focus to the first such leaf beneath it
 *   - Global next/previous skips containers marked `keyFocusSkip`
 *   - Group next/previous visits only leaves in the group, skip flag ignored
 *   - Both wrap around at the ends
 */

import type { FocusDirection } from "../container/options.js";
import { isLeaf } from "../container/node.js";
import { collectContainers, findByInstanceId } from "../container/traversal.js";
import type { Container, FocusGroup } from "../container/types.js";
import { containerAt } from "../layout/hitTest.js";

/** The focused container; the root when the recorded one is gone. */
export function focusedContainer(root: Container): Container {
  return findByInstanceId(root, root.tree.focusedId) ?? root;
}

export function isFocused(c: Container): boolean {
  return c.tree.focusedId === c.instanceId;
}

/** Focus `c` directly, with no traversal. */
export function setFocused(c: Container): void {
  c.tree.focusedId = c.instanceId;
}

/** Return focus to the root when the focused container left the tree. */
export function ensureFocusReachable(root: Container): void {
  if (findByInstanceId(root, root.tree.focusedId) === null) {
    root.tree.focusedId = root.instanceId;
  }
}

/**
 * Pick the next/previous container satisfying `eligible`, relative to the
 * focused container's pre-order position, wrapping at the ends.
 * Returns null when no container is eligible.
 */
export function computeMovedFocus(
  root: Container,
  move: FocusDirection,
  eligible: (c: Container) => boolean,
): Container | null {
  const order = collectContainers(root);
  const n = order.length;
  const focusedId = root.tree.focusedId;
  const idx = order.findIndex((c) => c.instanceId === focusedId);

  if (move === "next") {
    for (let i = idx + 1; i < n; i++) {
      const c = order[i];
      if (c !== undefined && eligible(c)) return c;
    }
    return order.find(eligible) ?? null;
  }

  // An unreachable focus (idx < 0) starts the backward scan from the end.
  const start = idx < 0 ? n : idx;
  for (let i = start - 1; i >= 0; i--) {
    const c = order[i];
    if (c !== undefined && eligible(c)) return c;
  }
  for (let i = n - 1; i >= 0; i--) {
    const c = order[i];
    if (c !== undefined && eligible(c)) return c;
  }
  return null;
}

function moveFocus(
  root: Container,
  move: FocusDirection,
  eligible: (c: Container) => boolean,
): Container | null {
  const target = computeMovedFocus(root, move, eligible);
  if (target !== null) setFocused(target);
  return target;
}

/** Leaves holding a widget; empty leaves never receive focus through traversal. */
function isFocusTarget(c: Container): boolean {
  return isLeaf(c) && c.widget !== null;
}

function isTraversable(c: Container): boolean {
  return isFocusTarget(c) && !c.opts.keyFocusSkip;
}

/** Move focus to the next non-skipped widget leaf. Returns the newly focused container. */
export function focusNext(root: Container): Container | null {
  return moveFocus(root, "next", isTraversable);
}

/** Move focus to the previous non-skipped widget leaf. */
export function focusPrevious(root: Container): Container | null {
  return moveFocus(root, "previous", isTraversable);
}

function inGroup(group: FocusGroup): (c: Container) => boolean {
  return (c) => isFocusTarget(c) && c.opts.keyFocusGroups.includes(group);
}

/** Move focus to the next widget leaf in `group`. */
export function focusGroupNext(root: Container, group: FocusGroup): Container | null {
  return moveFocus(root, "next", inGroup(group));
}

/** Move focus to the previous widget leaf in `group`. */
export function focusGroupPrevious(root: Container, group: FocusGroup): Container | null {
  return moveFocus(root, "previous", inGroup(group));
}

/**
 * First of the container's own groups (in declaration order) that is also in
 * `groups`, or null when they share none.
 */
export function firstMatchingGroup(
  c: Container,
  groups: ReadonlySet<FocusGroup>,
): FocusGroup | null {
  for (const g of c.opts.keyFocusGroups) {
    if (groups.has(g)) return g;
  }
  return null;
}

/**
 * Focus the container under a pointer position (deepest container whose
 * resolved area contains the point). Returns it, or null for a miss.
 */
export function focusAt(root: Container, x: number, y: number): Container | null {
  const target = containerAt(root, x, y);
  if (target !== null) setFocused(target);
  return target;
}
