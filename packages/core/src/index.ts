/**
 * @tessel-ui/core
 *
 * Container tree, geometry resolution and keyboard focus for terminal
 * dashboards. Runtime-agnostic: no Node-specific APIs.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  TesselError,
  toError,
  type TesselErrorCode,
  type TesselErrorKind,
  type TesselFatal,
  type TesselResult,
} from "./errors.js";

// =============================================================================
// Value tokens
// =============================================================================

export {
  DEFAULT_COLOR,
  rgb,
  type Color,
  type HorizontalAlign,
  type LineStyle,
  type Rgb24,
  type VerticalAlign,
} from "./style.js";

// =============================================================================
// Geometry
// =============================================================================

export type { Rect, Side, SplitAxis } from "./layout/types.js";
export { excludeBorder, formatRect, percentOf, rect, shrink, shrinkPercent } from "./layout/area.js";
export {
  EMPTY_SPACING,
  applySpacing,
  resolveSpacing,
  type Spacing,
  type SpacingUnit,
  type SpacingValue,
} from "./layout/spacing.js";
export { splitLength, splitRect, type SplitSizing } from "./layout/split.js";
export { resolveLayout, splitSizingOf } from "./layout/resolve.js";
export { containerAt, contains } from "./layout/hitTest.js";

// =============================================================================
// Containers
// =============================================================================

export type {
  Container,
  ContainerLayout,
  ContainerOptions,
  FocusGroup,
  GlobalOptions,
  InheritedOptions,
  Key,
  TreeContext,
  Widget,
} from "./container/types.js";
export {
  DEFAULT_FOCUSED_COLOR,
  DEFAULT_SPLIT_FIXED,
  DEFAULT_SPLIT_PERCENT,
  DEFAULT_SPLIT_REVERSED,
} from "./container/defaults.js";
export {
  opt,
  type BottomOptions,
  type ContainerOption,
  type ContainerOptionKind,
  type FocusDirection,
  type LeftOptions,
  type RightOptions,
  type SplitOption,
  type TopOptions,
} from "./container/options.js";
export { applyOption, applyOptions } from "./container/apply.js";
export { isLeaf } from "./container/node.js";
export {
  collectContainers,
  collectLeaves,
  findById,
  findByInstanceId,
  preOrder,
  type Visitor,
} from "./container/traversal.js";
export { validateTree } from "./container/validate.js";
export { createContainer, update } from "./container/container.js";

// =============================================================================
// Focus
// =============================================================================

export {
  computeMovedFocus,
  ensureFocusReachable,
  firstMatchingGroup,
  focusAt,
  focusGroupNext,
  focusGroupPrevious,
  focusNext,
  focusPrevious,
  focusedContainer,
  isFocused,
  setFocused,
} from "./runtime/focus.js";
export { handleFocusKey, type FocusKeyOutcome } from "./runtime/focusKeys.js";

// =============================================================================
// Diagnostics
// =============================================================================

export { isDevMode, setWarnSink, warnDev } from "./debug/warn.js";
