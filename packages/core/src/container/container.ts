/**
 * packages/core/src/container/container.ts — Container tree entry points.
 *
 * Why: Builds a tree from root options and supports later, id-targeted
 * updates. Both run the whole-tree validation after applying options, so a
 * successful call always leaves a tree that is safe to resolve.
 */

import { type TesselResult, configFatal, fail, ok } from "../errors.js";
import { ensureFocusReachable } from "../runtime/focus.js";
import { applyOptions } from "./apply.js";
import { createNode, createTreeContext } from "./node.js";
import type { ContainerOption } from "./options.js";
import { findById } from "./traversal.js";
import type { Container } from "./types.js";
import { validateTree } from "./validate.js";

/**
 * Create a root container, apply `options` to it and validate the result.
 * The root starts out focused unless an option focuses another container;
 * it gets focus back when that container is removed by a later option.
 */
export function createContainer(...options: ContainerOption[]): TesselResult<Container> {
  const tree = createTreeContext();
  const root = createNode(tree, null);
  tree.focusedId = root.instanceId;

  const applied = applyOptions(root, options);
  ensureFocusReachable(root);
  if (!applied.ok) return fail(applied.fatal);
  const validated = validateTree(root);
  if (!validated.ok) return fail(validated.fatal);
  return ok(root);
}

/**
 * Apply `options` to the container with identifier `id` and revalidate the
 * tree. If the change removed the focused container, focus returns to the
 * root. Options are not rolled back when application or validation fails.
 */
export function update(
  root: Container,
  id: string,
  ...options: ContainerOption[]
): TesselResult<void> {
  const target = findById(root, id);
  if (target === null) {
    return fail(
      configFatal("TSL_NOT_FOUND", `cannot update container "${id}": no container has this ID`, {
        value: id,
      }),
    );
  }

  const applied = applyOptions(target, options);
  ensureFocusReachable(root);
  if (!applied.ok) return applied;
  return validateTree(root);
}
