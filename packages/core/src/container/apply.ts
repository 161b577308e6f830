/**
 * packages/core/src/container/apply.ts — Option application engine.
 *
 * Why: Applies option variants to a container in order. Each option checks
 * its own argument before touching the container. The first failure stops
 * the run and is returned; options applied before it stay applied (there is
 * no rollback), so a caller that sees a failure should treat the container as
 * possibly half-configured.
 */

import { warnDev } from "../debug/warn.js";
import { OK, type TesselResult, configFatal, fail } from "../errors.js";
import { formatSpacingValue, withSide } from "../layout/spacing.js";
import type { Side } from "../layout/types.js";
import { createNode } from "./node.js";
import type { ContainerOption, FocusDirection, SplitOption } from "./options.js";
import type { Container, ContainerOptions, FocusGroup, Key } from "./types.js";

type SplitVariant = Extract<ContainerOption, { kind: "split" }>;
type SpacingVariant = Extract<ContainerOption, { kind: "spacing" }>;
type GroupsKeyVariant = Extract<ContainerOption, { kind: "keyFocusGroupsKey" }>;

function invalid(c: Container, detail: string, value: number | string): TesselResult<void> {
  return fail(configFatal("TSL_INVALID_OPTION", detail, { containerId: c.opts.id, value }));
}

function capitalize(s: string): string {
  return s.length === 0 ? s : `${s.charAt(0).toUpperCase()}${s.slice(1)}`;
}

/** Option name as written by the caller, e.g. "marginTopPercent". */
function spacingOptionName(target: string, side: Side, unit: "cells" | "percent"): string {
  return `${target}${capitalize(side)}${unit === "percent" ? "Percent" : ""}`;
}

function formatKey(key: Key): string {
  return typeof key === "string" ? `"${key}"` : String(key);
}

function formatGroups(groups: Iterable<FocusGroup>): string {
  return `[${Array.from(groups).join(", ")}]`;
}

function isValidGroup(g: FocusGroup): boolean {
  return Number.isInteger(g) && g >= 0;
}

/* --- Split --- */

function applySplitOption(c: Container, so: SplitOption): TesselResult<void> {
  const opts = c.opts;
  switch (so.kind) {
    case "splitPercent": {
      const p = so.percent;
      if (!Number.isInteger(p) || p <= 0 || p >= 100) {
        return invalid(c, `invalid split percentage ${p}, must be in range 0 < p < 100`, p);
      }
      opts.splitPercent = p;
      opts.splitReversed = so.fromEnd;
      return OK;
    }
    case "splitFixed": {
      const cells = so.cells;
      if (!Number.isInteger(cells) || cells < 0) {
        return invalid(c, `invalid fixed split size ${cells}, must be in range 0 <= cells`, cells);
      }
      opts.splitFixed = cells;
      opts.splitReversed = so.fromEnd;
      return OK;
    }
  }
}

function applySplit(c: Container, o: SplitVariant): TesselResult<void> {
  c.opts.split = o.axis;
  c.widget = null;

  let sizingKind: SplitOption["kind"] | null = null;
  for (const so of o.sizing) {
    if (sizingKind !== null && sizingKind !== so.kind) {
      return fail(
        configFatal(
          "TSL_SPLIT_CONFLICT",
          "only one of splitFixed and splitPercent may be given for one split",
          { containerId: c.opts.id },
        ),
      );
    }
    sizingKind = so.kind;
    const res = applySplitOption(c, so);
    if (!res.ok) return res;
  }

  const first = createNode(c.tree, c);
  const second = createNode(c.tree, c);
  c.first = first;
  c.second = second;

  const firstRes = applyOptions(first, o.first);
  if (!firstRes.ok) return firstRes;
  return applyOptions(second, o.second);
}

/* --- Spacing --- */

function applySpacingOption(c: Container, o: SpacingVariant): TesselResult<void> {
  const name = spacingOptionName(o.target, o.side, o.unit);
  const v = o.value;
  if (o.unit === "cells") {
    if (!Number.isInteger(v) || v < 0) {
      return invalid(c, `invalid ${name}(${v}), must be in range 0 <= value`, v);
    }
  } else if (!Number.isInteger(v) || v < 0 || v > 100) {
    return invalid(c, `invalid ${name}(${v}), must be in range 0 <= value <= 100`, v);
  }

  // Only a positive value in the other unit claims the side.
  const current = c.opts[o.target][o.side];
  if (current !== null && current.unit !== o.unit && current.value > 0) {
    const other = spacingOptionName(o.target, o.side, current.unit);
    return fail(
      configFatal(
        "TSL_SPACING_CONFLICT",
        `cannot specify both ${name}(${v}) and ${other}, already set to ${formatSpacingValue(current)}`,
        { containerId: c.opts.id, value: v },
      ),
    );
  }
  c.opts[o.target] = withSide(c.opts[o.target], o.side, { unit: o.unit, value: v });
  return OK;
}

/* --- Keyboard focus --- */

function applyKeyFocus(c: Container, direction: FocusDirection, key: Key): TesselResult<void> {
  const global = c.opts.global;
  if (direction === "next") {
    global.keyFocusNext = key;
    if (global.keyFocusPrevious === key) {
      warnDev(`key ${formatKey(key)} is bound to both keyFocusNext and keyFocusPrevious`);
    }
  } else {
    global.keyFocusPrevious = key;
    if (global.keyFocusNext === key) {
      warnDev(`key ${formatKey(key)} is bound to both keyFocusNext and keyFocusPrevious`);
    }
  }
  return OK;
}

function applyFocusGroups(c: Container, groups: readonly FocusGroup[]): TesselResult<void> {
  if (groups.length === 0) {
    c.opts.keyFocusGroups = [];
    return OK;
  }
  for (const g of groups) {
    if (!isValidGroup(g)) {
      return invalid(c, `invalid keyFocusGroups ${g}, must be 0 <= group`, g);
    }
  }
  c.opts.keyFocusGroups = [...c.opts.keyFocusGroups, ...groups];
  return OK;
}

function applyFocusGroupsKey(c: Container, o: GroupsKeyVariant): TesselResult<void> {
  const name = o.direction === "next" ? "keyFocusGroupsNext" : "keyFocusGroupsPrevious";
  for (const g of o.groups) {
    if (!isValidGroup(g)) {
      return invalid(
        c,
        `invalid group ${g} in ${name} for key ${formatKey(o.key)}, must be 0 <= group`,
        g,
      );
    }
  }
  if (o.groups.length === 0) return OK;

  const global = c.opts.global;
  const own = o.direction === "next" ? global.keyFocusGroupsNext : global.keyFocusGroupsPrevious;
  const other = o.direction === "next" ? global.keyFocusGroupsPrevious : global.keyFocusGroupsNext;
  const otherName = o.direction === "next" ? "keyFocusGroupsPrevious" : "keyFocusGroupsNext";

  const taken = other.get(o.key);
  if (taken !== undefined) {
    return fail(
      configFatal(
        "TSL_KEY_CONFLICT",
        `key ${formatKey(o.key)} is already assigned as a ${otherName} for focus groups ${formatGroups(taken)}`,
        { containerId: c.opts.id, value: o.key },
      ),
    );
  }

  let set = own.get(o.key);
  if (set === undefined) {
    set = new Set();
    own.set(o.key, set);
  }
  for (const g of o.groups) set.add(g);
  return OK;
}

/* --- Entry points --- */

/** Apply one option to `c`. */
export function applyOption(c: Container, o: ContainerOption): TesselResult<void> {
  const opts: ContainerOptions = c.opts;
  switch (o.kind) {
    case "id":
      if (o.id === "") {
        return invalid(c, "the ID cannot be an empty string", o.id);
      }
      opts.id = o.id;
      return OK;
    case "split":
      return applySplit(c, o);
    case "clear":
      c.widget = null;
      c.first = null;
      c.second = null;
      opts.split = null;
      return OK;
    case "placeWidget":
      c.widget = o.widget;
      c.first = null;
      c.second = null;
      opts.split = null;
      return OK;
    case "spacing":
      return applySpacingOption(c, o);
    case "alignHorizontal":
      opts.hAlign = o.align;
      return OK;
    case "alignVertical":
      opts.vAlign = o.align;
      return OK;
    case "border":
      opts.border = o.style;
      return OK;
    case "borderTitle":
      opts.borderTitle = o.title;
      return OK;
    case "borderTitleAlign":
      opts.borderTitleAlign = o.align;
      return OK;
    case "inheritedColor":
      opts.inherited[o.field] = o.color;
      return OK;
    case "keyFocus":
      return applyKeyFocus(c, o.direction, o.key);
    case "keyFocusSkip":
      opts.keyFocusSkip = true;
      return OK;
    case "keyFocusGroups":
      return applyFocusGroups(c, o.groups);
    case "keyFocusGroupsKey":
      return applyFocusGroupsKey(c, o);
    case "focused":
      c.tree.focusedId = c.instanceId;
      return OK;
  }
}

/**
 * Apply options in order, stopping at the first failure.
 * Options before the failing one remain applied.
 */
export function applyOptions(
  c: Container,
  options: readonly ContainerOption[],
): TesselResult<void> {
  for (const o of options) {
    const res = applyOption(c, o);
    if (!res.ok) return res;
  }
  return OK;
}
