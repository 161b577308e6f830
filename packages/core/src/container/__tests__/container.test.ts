import { assert, describe, mustExist, mustFail, mustOk, test } from "@tessel-ui/testkit";
import { isFocused } from "../../runtime/focus.js";
import { rgb } from "../../style.js";
import { createContainer, update } from "../container.js";
import { DEFAULT_FOCUSED_COLOR } from "../defaults.js";
import { opt } from "../options.js";
import { collectContainers } from "../traversal.js";

describe("createContainer", () => {
  test("a bare root is a focused empty leaf with defaults", () => {
    const root = mustOk(createContainer());
    assert.equal(root.tree.focusedId, root.instanceId);
    assert.equal(root.widget, null);
    assert.equal(root.layout, null);
    assert.equal(root.opts.hAlign, "center");
    assert.equal(root.opts.vAlign, "middle");
    assert.equal(root.opts.border, "none");
    assert.equal(root.opts.borderTitleAlign, "left");
    assert.equal(root.opts.splitPercent, 50);
    assert.equal(root.opts.splitFixed, -1);
    assert.deepEqual(root.opts.inherited, {
      borderColor: 0,
      focusedColor: DEFAULT_FOCUSED_COLOR,
      titleColor: null,
      titleFocusedColor: null,
    });
  });

  test("local options are stored", () => {
    const root = mustOk(
      createContainer(
        opt.border("rounded"),
        opt.borderTitle("Logs"),
        opt.borderTitleAlignRight(),
        opt.alignHorizontal("left"),
        opt.alignVertical("bottom"),
      ),
    );
    assert.equal(root.opts.border, "rounded");
    assert.equal(root.opts.borderTitle, "Logs");
    assert.equal(root.opts.borderTitleAlign, "right");
    assert.equal(root.opts.hAlign, "left");
    assert.equal(root.opts.vAlign, "bottom");
  });

  test("children copy inherited colors set before the split", () => {
    const red = rgb(255, 0, 0);
    const root = mustOk(
      createContainer(
        opt.borderColor(red),
        opt.splitVertical(opt.left(opt.titleColor(rgb(0, 0, 255))), opt.right()),
        opt.focusedColor(rgb(0, 255, 0)),
      ),
    );
    const left = mustExist(root.first);
    const right = mustExist(root.second);
    assert.equal(left.opts.inherited.borderColor, red);
    assert.equal(left.opts.inherited.titleColor, rgb(0, 0, 255));
    assert.equal(right.opts.inherited.titleColor, null);
    assert.equal(root.opts.inherited.titleColor, null);
    // set after the children were created
    assert.equal(root.opts.inherited.focusedColor, rgb(0, 255, 0));
    assert.equal(left.opts.inherited.focusedColor, DEFAULT_FOCUSED_COLOR);
  });

  test("focus returns to the root when a later option removes the focused container", () => {
    const root = mustOk(
      createContainer(
        opt.splitVertical(opt.left(opt.id("l"), opt.focused()), opt.right()),
        opt.placeWidget({ name: "w" }),
      ),
    );
    assert.equal(root.tree.focusedId, root.instanceId);
    assert.deepEqual(
      collectContainers(root)
        .filter(isFocused)
        .map((c) => c.instanceId),
      [root.instanceId],
    );
  });

  test("an invalid option fails creation", () => {
    const fatal = mustFail(createContainer(opt.marginTop(-1)));
    assert.equal(fatal.kind, "configuration");
  });
});

describe("update", () => {
  test("applies options to the container with the id", () => {
    const root = mustOk(
      createContainer(opt.splitVertical(opt.left(opt.id("l")), opt.right(opt.id("r")))),
    );
    mustOk(update(root, "r", opt.borderTitle("R")));
    assert.equal(mustExist(root.second).opts.borderTitle, "R");
  });

  test("an unknown id fails", () => {
    const root = mustOk(createContainer(opt.id("root")));
    const fatal = mustFail(update(root, "nope", opt.clear()));
    assert.equal(fatal.code, "TSL_NOT_FOUND");
    assert.equal(fatal.detail, 'cannot update container "nope": no container has this ID');
    assert.equal(fatal.value, "nope");
  });

  test("focus returns to the root when the focused container is removed", () => {
    const root = mustOk(
      createContainer(
        opt.id("root"),
        opt.splitVertical(opt.left(opt.id("l"), opt.focused()), opt.right()),
      ),
    );
    assert.equal(root.tree.focusedId, mustExist(root.first).instanceId);
    mustOk(update(root, "root", opt.clear()));
    assert.equal(root.tree.focusedId, root.instanceId);
  });

  test("focus is kept when the focused container survives", () => {
    const root = mustOk(
      createContainer(
        opt.splitVertical(opt.left(opt.id("l"), opt.focused()), opt.right(opt.id("r"))),
      ),
    );
    mustOk(update(root, "r", opt.placeWidget({ name: "w" })));
    assert.equal(root.tree.focusedId, mustExist(root.first).instanceId);
  });
});
