import { assert, describe, test } from "@wrapflow/testkit";
import { FlowLayoutError } from "../../errors.js";
import { createFlowLayoutEngine } from "../flow/flowLayout.js";
import { defaultPreferredDistance } from "../flow/spacing.js";
import type { PreferredSpacingFn } from "../flow/types.js";
import { validateFlowLayoutProps } from "../validateProps.js";

function mustFail(props: unknown): string {
  const res = validateFlowLayoutProps(props);
  if (res.ok) {
    assert.fail("expected props validation to fail");
  }
  assert.equal(res.fatal.code, "FLOW_INVALID_PROPS");
  return res.fatal.detail;
}

describe("validateFlowLayoutProps", () => {
  test("applies defaults", () => {
    const res = validateFlowLayoutProps(undefined);
    assert.ok(res.ok);
    assert.deepEqual(res.value, {
      alignment: "center",
      anchor: { x: 0.5, y: 0.5 },
      horizontalSpacing: undefined,
      verticalSpacing: undefined,
      preferredSpacing: defaultPreferredDistance,
    });
  });

  test("keeps configured values", () => {
    const preferred: PreferredSpacingFn = () => 3;
    const res = validateFlowLayoutProps({
      alignment: "bottomTrailing",
      horizontalSpacing: 4,
      verticalSpacing: 0,
      preferredSpacing: preferred,
    });
    assert.ok(res.ok);
    assert.equal(res.value.alignment, "bottomTrailing");
    assert.deepEqual(res.value.anchor, { x: 1, y: 1 });
    assert.equal(res.value.horizontalSpacing, 4);
    assert.equal(res.value.verticalSpacing, 0);
    assert.equal(res.value.preferredSpacing, preferred);
  });

  test("null spacing means unset", () => {
    const res = validateFlowLayoutProps({ horizontalSpacing: null });
    assert.ok(res.ok);
    assert.equal(res.value.horizontalSpacing, undefined);
  });

  test("rejects negative spacing", () => {
    assert.equal(
      mustFail({ horizontalSpacing: -1 }),
      'Invalid prop "horizontalSpacing" on <flow>: expected a finite number >= 0, got number (-1)',
    );
  });

  test("rejects non-finite spacing", () => {
    assert.equal(
      mustFail({ verticalSpacing: Number.POSITIVE_INFINITY }),
      'Invalid prop "verticalSpacing" on <flow>: expected a finite number >= 0, got number (Infinity)',
    );
  });

  test("rejects string spacing", () => {
    assert.equal(
      mustFail({ verticalSpacing: "4" }),
      'Invalid prop "verticalSpacing" on <flow>: expected a finite number >= 0, got string (4)',
    );
  });

  test("rejects non-string alignment", () => {
    assert.equal(
      mustFail({ alignment: 3 }),
      'Invalid prop "alignment" on <flow>: expected an alignment name, got number (3)',
    );
  });

  test("rejects a non-function preferredSpacing", () => {
    assert.equal(
      mustFail({ preferredSpacing: [] }),
      'Invalid prop "preferredSpacing" on <flow>: expected a function, got array ()',
    );
  });

  test("rejects non-object props", () => {
    assert.equal(
      mustFail("wide"),
      'Invalid prop "props" on <flow>: expected an object, got string (wide)',
    );
  });
});

describe("createFlowLayoutEngine props", () => {
  test("throws FlowLayoutError on invalid props", () => {
    assert.throws(
      () => createFlowLayoutEngine({ horizontalSpacing: -2 }),
      (err: unknown) =>
        err instanceof FlowLayoutError &&
        err.code === "FLOW_INVALID_PROPS" &&
        err.name === "FlowLayoutError" &&
        err.message ===
          'Invalid prop "horizontalSpacing" on <flow>: expected a finite number >= 0, got number (-2)',
    );
  });

  test("exposes validated props and layout properties", () => {
    const engine = createFlowLayoutEngine({ alignment: "leading", verticalSpacing: 2 });
    assert.equal(engine.props.alignment, "leading");
    assert.deepEqual(engine.props.anchor, { x: 0, y: 0.5 });
    assert.equal(engine.props.verticalSpacing, 2);
    assert.deepEqual(engine.properties, { stackOrientation: "row" });
  });
});
