/**
 * packages/core/src/container/validate.ts — Whole-tree option validation.
 *
 * Why: Some constraints span containers (identifier uniqueness) or can only
 * be broken across several option calls (an earlier percentage split kept
 * when a later update adds a fixed split). This pass checks them all and
 * reports every problem found, folded into one result.
 *
 * Rules:
 *   - non-empty identifiers are unique in the tree; empty ones never clash
 *   - a container does not carry both a fixed split size and a non-default
 *     split percentage
 */

import {
  OK,
  type TesselFatal,
  type TesselResult,
  aggregateFatals,
  configFatal,
  fail,
} from "../errors.js";
import { DEFAULT_SPLIT_FIXED, DEFAULT_SPLIT_PERCENT } from "./defaults.js";
import { preOrder } from "./traversal.js";
import type { Container } from "./types.js";

function checkId(c: Container, seen: Set<string>): TesselFatal | null {
  const id = c.opts.id;
  if (id === "") return null;
  if (seen.has(id)) {
    return configFatal("TSL_DUPLICATE_ID", `duplicate container ID "${id}"`, {
      containerId: id,
      value: id,
    });
  }
  seen.add(id);
  return null;
}

function checkSplit(c: Container): TesselFatal | null {
  const { splitFixed, splitPercent } = c.opts;
  if (splitFixed > DEFAULT_SPLIT_FIXED && splitPercent !== DEFAULT_SPLIT_PERCENT) {
    return configFatal(
      "TSL_SPLIT_CONFLICT",
      `only one of splitFixed (${splitFixed}) and splitPercent (${splitPercent}) is allowed to be set per container`,
      { containerId: c.opts.id },
    );
  }
  return null;
}

/** Validate the whole tree rooted at `root`. */
export function validateTree(root: Container): TesselResult<void> {
  const seen = new Set<string>();
  const problems: TesselFatal[] = [];
  preOrder(root, (c) => {
    const idProblem = checkId(c, seen);
    if (idProblem !== null) problems.push(idProblem);
    const splitProblem = checkSplit(c);
    if (splitProblem !== null) problems.push(splitProblem);
    return true;
  });
  const fatal = aggregateFatals(problems);
  return fatal === null ? OK : fail(fatal);
}
