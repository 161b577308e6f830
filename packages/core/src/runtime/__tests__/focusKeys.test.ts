import { assert, describe, mustOk, test } from "@tessel-ui/testkit";
import { createContainer } from "../../container/container.js";
import { type ContainerOption, opt } from "../../container/options.js";
import type { Container } from "../../container/types.js";
import { focusedContainer } from "../focus.js";
import { handleFocusKey } from "../focusKeys.js";

const W = { name: "w" };

/** A | B | C widget leaves with A focused */
function three(...rootOptions: ContainerOption[]): Container {
  return mustOk(
    createContainer(
      ...rootOptions,
      opt.splitVertical(
        opt.left(opt.id("A"), opt.placeWidget(W), opt.keyFocusGroups(2, 1), opt.focused()),
        opt.right(
          opt.splitVertical(
            opt.left(opt.id("B"), opt.placeWidget(W), opt.keyFocusGroups(1)),
            opt.right(opt.id("C"), opt.placeWidget(W), opt.keyFocusGroups(2)),
          ),
        ),
      ),
    ),
  );
}

function focusedId(root: Container): string {
  return focusedContainer(root).opts.id;
}

describe("handleFocusKey", () => {
  test("unbound keys do nothing", () => {
    const root = three(opt.keyFocusNext("tab"));
    assert.equal(handleFocusKey(root, "x"), "unbound");
    assert.equal(focusedId(root), "A");
  });

  test("keys compare by value", () => {
    const root = three(opt.keyFocusNext(9));
    assert.equal(handleFocusKey(root, "9"), "unbound");
    assert.equal(handleFocusKey(root, 9), "moved");
    assert.equal(focusedId(root), "B");
  });

  test("next and previous keys move through leaves", () => {
    const root = three(opt.keyFocusNext("tab"), opt.keyFocusPrevious("backtab"));
    handleFocusKey(root, "tab");
    handleFocusKey(root, "tab");
    assert.equal(focusedId(root), "C");
    handleFocusKey(root, "tab");
    assert.equal(focusedId(root), "A");
    assert.equal(handleFocusKey(root, "backtab"), "moved");
    assert.equal(focusedId(root), "C");
  });

  test("keyFocusNext takes precedence over keyFocusPrevious", () => {
    const root = three(opt.keyFocusNext("k"), opt.keyFocusPrevious("k"));
    handleFocusKey(root, "k");
    assert.equal(focusedId(root), "B");
  });

  test("a group key follows the focused container's first matching group", () => {
    const root = three(opt.keyFocusGroupsNext("g", 1, 2));
    assert.equal(handleFocusKey(root, "g"), "moved");
    assert.equal(focusedId(root), "C");
  });

  test("a group key for groups the focused container is not in is ignored", () => {
    const root = three(opt.keyFocusGroupsPrevious("p", 7));
    assert.equal(handleFocusKey(root, "p"), "ignored");
    assert.equal(focusedId(root), "A");
  });

  test("group previous key", () => {
    const root = three(opt.keyFocusGroupsPrevious("p", 1));
    assert.equal(handleFocusKey(root, "p"), "moved");
    assert.equal(focusedId(root), "B");
  });

  test("global keys shadow group keys", () => {
    const root = three(opt.keyFocusNext("g"), opt.keyFocusGroupsNext("g", 2));
    handleFocusKey(root, "g");
    assert.equal(focusedId(root), "B");
  });
});
