import { assert, describe, mustOk, test } from "@tessel-ui/testkit";
import { createContainer } from "../../container/container.js";
import { opt } from "../../container/options.js";
import { rect } from "../area.js";
import { containerAt, contains } from "../hitTest.js";
import { resolveLayout } from "../resolve.js";

const W = { name: "w" };

describe("contains", () => {
  test("right and bottom edges are exclusive", () => {
    const r = rect(2, 3, 4, 5);
    assert.equal(contains(r, 2, 3), true);
    assert.equal(contains(r, 5, 7), true);
    assert.equal(contains(r, 6, 3), false);
    assert.equal(contains(r, 2, 8), false);
    assert.equal(contains(r, 1, 3), false);
  });

  test("empty rectangles contain nothing", () => {
    assert.equal(contains(rect(0, 0, 0, 5), 0, 0), false);
  });
});

describe("containerAt", () => {
  function dashboard() {
    const root = mustOk(
      createContainer(
        opt.id("root"),
        opt.border("single"),
        opt.splitVertical(
          opt.left(opt.id("nav"), opt.placeWidget(W)),
          opt.right(
            opt.id("main"),
            opt.splitHorizontal(
              opt.top(opt.id("top"), opt.placeWidget(W)),
              opt.bottom(opt.id("bottom"), opt.placeWidget(W)),
            ),
          ),
          opt.splitFixed(4),
        ),
      ),
    );
    // inner (1,1 10x6): nav (1,1 4x6), main (5,1 6x6) -> top (5,1 6x3), bottom (5,4 6x3)
    mustOk(resolveLayout(root, rect(0, 0, 12, 8)));
    return root;
  }

  test("returns the deepest container under the point", () => {
    const root = dashboard();
    assert.equal(containerAt(root, 1, 1)?.opts.id, "nav");
    assert.equal(containerAt(root, 5, 3)?.opts.id, "top");
    assert.equal(containerAt(root, 10, 4)?.opts.id, "bottom");
  });

  test("a point on the border resolves to the split container", () => {
    const root = dashboard();
    assert.equal(containerAt(root, 0, 0)?.opts.id, "root");
    assert.equal(containerAt(root, 11, 7)?.opts.id, "root");
  });

  test("points outside the root miss", () => {
    const root = dashboard();
    assert.equal(containerAt(root, 12, 0), null);
    assert.equal(containerAt(root, -1, 2), null);
  });

  test("margins belong to the enclosing container", () => {
    const root = mustOk(
      createContainer(
        opt.id("root"),
        opt.marginTop(1),
        opt.splitVertical(
          opt.left(opt.id("l"), opt.marginLeft(2), opt.placeWidget(W)),
          opt.right(opt.id("r"), opt.placeWidget(W)),
        ),
      ),
    );
    // root box (0,1 10x3): l area (0,1 5x3), box (2,1 3x3); r (5,1 5x3)
    mustOk(resolveLayout(root, rect(0, 0, 10, 4)));
    assert.equal(containerAt(root, 0, 0), null);
    assert.equal(containerAt(root, 1, 2)?.opts.id, "root");
    assert.equal(containerAt(root, 2, 2)?.opts.id, "l");
    assert.equal(containerAt(root, 5, 2)?.opts.id, "r");
  });

  test("unresolved trees miss everywhere", () => {
    const root = mustOk(createContainer(opt.placeWidget(W)));
    assert.equal(containerAt(root, 0, 0), null);
    assert.equal(root.layout, null);
  });
});
