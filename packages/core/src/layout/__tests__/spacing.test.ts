import { assert, describe, mustFail, mustOk, test } from "@tessel-ui/testkit";
import { rect } from "../area.js";
import {
  EMPTY_SPACING,
  type Spacing,
  applySpacing,
  isEmptySpacing,
  resolveSpacing,
  withSide,
} from "../spacing.js";

const area = rect(0, 0, 20, 10);

describe("spacing - resolveSpacing", () => {
  test("unset sides take no cells", () => {
    assert.deepEqual(resolveSpacing(EMPTY_SPACING, area), { top: 0, right: 0, bottom: 0, left: 0 });
  });

  test("mixes cells and percentages per side", () => {
    const spacing: Spacing = {
      top: { unit: "percent", value: 30 },
      right: { unit: "cells", value: 2 },
      bottom: null,
      left: { unit: "percent", value: 15 },
    };
    assert.deepEqual(resolveSpacing(spacing, area), { top: 3, right: 2, bottom: 0, left: 3 });
  });
});

describe("spacing - applySpacing", () => {
  test("empty spacing returns the same rectangle", () => {
    assert.equal(isEmptySpacing(EMPTY_SPACING), true);
    assert.equal(mustOk(applySpacing(EMPTY_SPACING, area, "margin")), area);
  });

  test("top 50% of height 10 leaves height 5 at the bottom", () => {
    const spacing = withSide(EMPTY_SPACING, "top", { unit: "percent", value: 50 });
    assert.deepEqual(mustOk(applySpacing(spacing, area, "margin")), { x: 0, y: 5, w: 20, h: 5 });
  });

  test("top and bottom 50% leave height 0", () => {
    const spacing = withSide(
      withSide(EMPTY_SPACING, "top", { unit: "percent", value: 50 }),
      "bottom",
      { unit: "percent", value: 50 },
    );
    assert.deepEqual(mustOk(applySpacing(spacing, area, "margin")), { x: 0, y: 5, w: 20, h: 0 });
  });

  test("top 50% and bottom 60% overflow", () => {
    const spacing = withSide(
      withSide(EMPTY_SPACING, "top", { unit: "percent", value: 50 }),
      "bottom",
      { unit: "percent", value: 60 },
    );
    const fatal = mustFail(applySpacing(spacing, area, "margin"));
    assert.equal(fatal.code, "TSL_GEOMETRY");
    assert.equal(
      fatal.detail,
      "margin does not fit: cannot shrink (0,0 20x10) by top=5 right=0 bottom=6 left=0: result would be 20x-1",
    );
  });

  test("withSide leaves the source record untouched", () => {
    const next = withSide(EMPTY_SPACING, "left", { unit: "cells", value: 1 });
    assert.equal(EMPTY_SPACING.left, null);
    assert.deepEqual(next.left, { unit: "cells", value: 1 });
    assert.equal(isEmptySpacing(next), false);
  });
});
