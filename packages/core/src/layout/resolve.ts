/**
 * packages/core/src/layout/resolve.ts — Split and geometry resolution.
 *
 * Why: Turns a container tree plus the screen rectangle into concrete
 * rectangles for every node, top-down. Called on every resize.
 *
 * Per container:
 *   1. area     rectangle allotted by the parent (the root gets the screen)
 *   2. box      area minus margin
 *   3. inner    box minus a one-cell border when the border style is not "none"
 *   4. split containers divide inner between their children;
 *      widget leaves get content = inner minus padding
 *
 * A rectangle that would shrink below zero fails only its own subtree: that
 * subtree keeps `layout = null` (nothing to draw) while siblings resolve.
 */

import { describeContainer } from "../container/node.js";
import { preOrder } from "../container/traversal.js";
import type { Container, ContainerLayout } from "../container/types.js";
import { warnDev } from "../debug/warn.js";
import {
  OK,
  type TesselFatal,
  type TesselResult,
  aggregateFatals,
  fail,
  geometryFatal,
} from "../errors.js";
import { excludeBorder } from "./area.js";
import { applySpacing } from "./spacing.js";
import { type SplitSizing, splitRect } from "./split.js";
import type { Rect } from "./types.js";

function clearSubtree(c: Container): void {
  preOrder(c, (n) => {
    n.layout = null;
    return true;
  });
}

function subtreeFailure(c: Container, fatal: TesselFatal): TesselFatal {
  return geometryFatal(`${describeContainer(c)}: ${fatal.detail}`, { containerId: c.opts.id });
}

/** Split sizing configured on `c`. */
export function splitSizingOf(c: Container): SplitSizing {
  return {
    percent: c.opts.splitPercent,
    fixed: c.opts.splitFixed,
    reversed: c.opts.splitReversed,
  };
}

function resolveNode(c: Container, area: Rect, problems: TesselFatal[]): void {
  const boxRes = applySpacing(c.opts.margin, area, "margin");
  if (!boxRes.ok) {
    problems.push(subtreeFailure(c, boxRes.fatal));
    clearSubtree(c);
    return;
  }
  const box = boxRes.value;

  let inner = box;
  if (c.opts.border !== "none") {
    const innerRes = excludeBorder(box);
    if (!innerRes.ok) {
      problems.push(subtreeFailure(c, innerRes.fatal));
      clearSubtree(c);
      return;
    }
    inner = innerRes.value;
  }

  if (c.first !== null && c.second !== null) {
    const [firstArea, secondArea] = splitRect(inner, c.opts.split ?? "vertical", splitSizingOf(c));
    c.layout = freezeLayout({ area, box, inner, content: inner });
    resolveNode(c.first, firstArea, problems);
    resolveNode(c.second, secondArea, problems);
    return;
  }

  let content = inner;
  if (c.widget !== null) {
    const contentRes = applySpacing(c.opts.padding, inner, "padding");
    if (!contentRes.ok) {
      problems.push(subtreeFailure(c, contentRes.fatal));
      clearSubtree(c);
      return;
    }
    content = contentRes.value;
  }
  c.layout = freezeLayout({ area, box, inner, content });
}

function freezeLayout(layout: ContainerLayout): ContainerLayout {
  return Object.freeze(layout);
}

/**
 * Recompute and store the layout of every container under `root`.
 * Failures of individual subtrees are all reported, folded into one result.
 */
export function resolveLayout(root: Container, area: Rect): TesselResult<void> {
  const problems: TesselFatal[] = [];
  resolveNode(root, area, problems);
  const fatal = aggregateFatals(problems);
  if (fatal === null) return OK;
  warnDev(`layout skipped ${problems.length} subtree(s): ${fatal.detail}`);
  return fail(fatal);
}
