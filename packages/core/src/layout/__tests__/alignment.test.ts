import { assert, describe, mock, test } from "@wrapflow/testkit";
import {
  ALIGNMENT_ANCHORS,
  CENTER_ANCHOR,
  anchorForAlignment,
  isFlowAlignment,
  resolveElementPosition,
} from "../alignment.js";
import type { FlowRow, FlowRowElement } from "../flow/types.js";

const FIRST: FlowRowElement = { index: 0, size: { w: 50, h: 20 }, x: 0 };
const SECOND: FlowRowElement = { index: 1, size: { w: 50, h: 10 }, x: 60 };

const ROW: FlowRow = {
  elements: [FIRST, SECOND],
  w: 110,
  y: 25,
  h: 20,
  tallest: 0,
};

describe("anchorForAlignment", () => {
  test("compass points map to their fractions", () => {
    assert.deepEqual(anchorForAlignment("topLeading"), { x: 0, y: 0 });
    assert.deepEqual(anchorForAlignment("top"), { x: 0.5, y: 0 });
    assert.deepEqual(anchorForAlignment("topTrailing"), { x: 1, y: 0 });
    assert.deepEqual(anchorForAlignment("leading"), { x: 0, y: 0.5 });
    assert.deepEqual(anchorForAlignment("center"), { x: 0.5, y: 0.5 });
    assert.deepEqual(anchorForAlignment("trailing"), { x: 1, y: 0.5 });
    assert.deepEqual(anchorForAlignment("bottomLeading"), { x: 0, y: 1 });
    assert.deepEqual(anchorForAlignment("bottom"), { x: 0.5, y: 1 });
    assert.deepEqual(anchorForAlignment("bottomTrailing"), { x: 1, y: 1 });
    assert.equal(Object.keys(ALIGNMENT_ANCHORS).length, 9);
  });

  test("composite baseline alignments fall back to center", () => {
    assert.equal(anchorForAlignment("leadingFirstTextBaseline"), CENTER_ANCHOR);
    assert.equal(anchorForAlignment("trailingLastTextBaseline"), CENTER_ANCHOR);
    assert.ok(isFlowAlignment("centerFirstTextBaseline"));
  });

  test("inherited object keys are not alignments", () => {
    assert.equal(isFlowAlignment("toString"), false);
  });

  test("unknown values fall back to center and warn once", () => {
    const warn = mock.method(console, "warn", () => {});
    try {
      assert.equal(anchorForAlignment("diagonal"), CENTER_ANCHOR);
      assert.equal(anchorForAlignment("diagonal"), CENTER_ANCHOR);
      assert.equal(warn.mock.callCount(), 1);
      assert.deepEqual(warn.mock.calls[0]?.arguments, [
        '[wrapflow] unknown alignment "diagonal", using center',
      ]);
    } finally {
      warn.mock.restore();
    }
  });

  test("non-string values fall back to center", () => {
    const warn = mock.method(console, "warn", () => {});
    try {
      assert.equal(anchorForAlignment(42), CENTER_ANCHOR);
      assert.equal(warn.mock.callCount(), 1);
    } finally {
      warn.mock.restore();
    }
  });
});

describe("resolveElementPosition", () => {
  const bounds = { x: 10, y: 20, w: 120, h: 45 };

  test("top-leading keeps packed offsets", () => {
    const anchor = anchorForAlignment("topLeading");
    assert.deepEqual(resolveElementPosition(SECOND, ROW, anchor, bounds), { x: 70, y: 45 });
  });

  test("center splits the unused row width and item height", () => {
    const anchor = anchorForAlignment("center");
    assert.deepEqual(resolveElementPosition(FIRST, ROW, anchor, bounds), { x: 15, y: 45 });
    assert.deepEqual(resolveElementPosition(SECOND, ROW, anchor, bounds), { x: 75, y: 50 });
  });

  test("bottom-trailing pushes to the far edges", () => {
    const anchor = anchorForAlignment("bottomTrailing");
    assert.deepEqual(resolveElementPosition(SECOND, ROW, anchor, bounds), { x: 80, y: 55 });
  });
});
