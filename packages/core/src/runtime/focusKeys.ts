/**
 * packages/core/src/runtime/focusKeys.ts — Routing focus keys to focus moves.
 *
 * Bindings come from the tree's global options. Precedence:
 *   1. keyFocusNext
 *   2. keyFocusPrevious
 *   3. keyFocusGroupsNext
 *   4. keyFocusGroupsPrevious
 *
 * A group key only acts when the focused container belongs to one of the
 * key's groups; the group followed is the first such group in the
 * container's own declaration order.
 */

import type { Container, Key } from "../container/types.js";
import {
  firstMatchingGroup,
  focusGroupNext,
  focusGroupPrevious,
  focusNext,
  focusPrevious,
  focusedContainer,
} from "./focus.js";

/** What a key press did to focus. */
export type FocusKeyOutcome =
  | "unbound" // the key has no focus binding
  | "ignored" // a group key while the focused container is outside its groups
  | "moved"; // traversal ran (focus may stay put when nothing else qualifies)

/** Handle a key press. */
export function handleFocusKey(root: Container, key: Key): FocusKeyOutcome {
  const global = root.opts.global;
  if (global.keyFocusNext === key) {
    focusNext(root);
    return "moved";
  }
  if (global.keyFocusPrevious === key) {
    focusPrevious(root);
    return "moved";
  }

  const nextGroups = global.keyFocusGroupsNext.get(key);
  const prevGroups = global.keyFocusGroupsPrevious.get(key);
  const groups = nextGroups ?? prevGroups;
  if (groups === undefined) return "unbound";

  const group = firstMatchingGroup(focusedContainer(root), groups);
  if (group === null) return "ignored";
  if (nextGroups !== undefined) {
    focusGroupNext(root, group);
  } else {
    focusGroupPrevious(root, group);
  }
  return "moved";
}
