/**
 * packages/core/src/container/node.ts — Container node allocation.
 */

import { createOptions } from "./defaults.js";
import type { Container, TreeContext } from "./types.js";

export function createTreeContext(): TreeContext {
  return { nextInstanceId: 1, focusedId: 0 };
}

/**
 * Allocate a container in `tree`. With a parent, the new node starts from
 * the parent's inherited values and shares its global options.
 */
export function createNode(tree: TreeContext, parent: Container | null): Container {
  const instanceId = tree.nextInstanceId;
  tree.nextInstanceId++;
  return {
    instanceId,
    tree,
    opts: createOptions(parent !== null ? parent.opts : null),
    first: null,
    second: null,
    widget: null,
    layout: null,
  };
}

/** A leaf has no sub containers. It may or may not hold a widget. */
export function isLeaf(c: Container): boolean {
  return c.first === null && c.second === null;
}

/** Human-readable name for diagnostics. */
export function describeContainer(c: Container): string {
  return c.opts.id !== "" ? `container "${c.opts.id}"` : `container #${c.instanceId}`;
}
