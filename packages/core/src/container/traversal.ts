/**
 * packages/core/src/container/traversal.ts — Tree walks and lookups.
 *
 * Order everywhere is depth-first pre-order: a parent before its children,
 * the first child (left/top) before the second (right/bottom).
 */

import { isLeaf } from "./node.js";
import type { Container } from "./types.js";

/** Visitor; returning false stops the walk. */
export type Visitor = (c: Container) => boolean | undefined;

/** Walk the tree in pre-order. Returns false when the visitor stopped it. */
export function preOrder(root: Container, visit: Visitor): boolean {
  const stack: Container[] = [root];
  while (stack.length > 0) {
    const c = stack.pop();
    if (c === undefined) break;
    if (visit(c) === false) return false;
    if (c.second !== null) stack.push(c.second);
    if (c.first !== null) stack.push(c.first);
  }
  return true;
}

/** All containers in pre-order. */
export function collectContainers(root: Container): readonly Container[] {
  const out: Container[] = [];
  preOrder(root, (c) => {
    out.push(c);
    return true;
  });
  return out;
}

/** Leaf containers in left-to-right order. */
export function collectLeaves(root: Container): readonly Container[] {
  const out: Container[] = [];
  preOrder(root, (c) => {
    if (isLeaf(c)) out.push(c);
    return true;
  });
  return out;
}

export function findById(root: Container, id: string): Container | null {
  if (id === "") return null;
  let found: Container | null = null;
  preOrder(root, (c) => {
    if (c.opts.id !== id) return true;
    found = c;
    return false;
  });
  return found;
}

export function findByInstanceId(root: Container, instanceId: number): Container | null {
  let found: Container | null = null;
  preOrder(root, (c) => {
    if (c.instanceId !== instanceId) return true;
    found = c;
    return false;
  });
  return found;
}
