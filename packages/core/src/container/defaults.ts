/**
 * packages/core/src/container/defaults.ts — Default configuration values.
 */

import { EMPTY_SPACING } from "../layout/spacing.js";
import { type Color, DEFAULT_COLOR, rgb } from "../style.js";
import type { ContainerOptions, GlobalOptions, InheritedOptions } from "./types.js";

export const DEFAULT_SPLIT_PERCENT = 50;

/** Negative sentinel: no fixed split size configured. */
export const DEFAULT_SPLIT_FIXED = -1;

export const DEFAULT_SPLIT_REVERSED = false;

export const DEFAULT_FOCUSED_COLOR: Color = rgb(255, 255, 0);

function createGlobalOptions(): GlobalOptions {
  return {
    keyFocusNext: null,
    keyFocusPrevious: null,
    keyFocusGroupsNext: new Map(),
    keyFocusGroupsPrevious: new Map(),
  };
}

function defaultInherited(): InheritedOptions {
  return {
    borderColor: DEFAULT_COLOR,
    focusedColor: DEFAULT_FOCUSED_COLOR,
    titleColor: null,
    titleFocusedColor: null,
  };
}

/**
 * Options for a new container. A child copies the parent's inherited values
 * and shares the parent's global record; a root gets fresh ones.
 */
export function createOptions(parent: ContainerOptions | null): ContainerOptions {
  return {
    id: "",
    inherited: parent !== null ? { ...parent.inherited } : defaultInherited(),
    global: parent !== null ? parent.global : createGlobalOptions(),
    split: null,
    splitPercent: DEFAULT_SPLIT_PERCENT,
    splitFixed: DEFAULT_SPLIT_FIXED,
    splitReversed: DEFAULT_SPLIT_REVERSED,
    hAlign: "center",
    vAlign: "middle",
    border: "none",
    borderTitle: "",
    borderTitleAlign: "left",
    margin: EMPTY_SPACING,
    padding: EMPTY_SPACING,
    keyFocusSkip: false,
    keyFocusGroups: [],
  };
}
