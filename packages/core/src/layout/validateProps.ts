/**
 * packages/core/src/layout/validateProps.ts — Flow layout props validation.
 *
 * Why: Validates construction props once, before any layout pass, and returns
 * a structured fatal error instead of throwing so callers can choose how to
 * report it.
 *
 * Validation rules:
 *   - alignment must be a string (default "center"); values outside the
 *     anchor table resolve to the center anchor
 *   - horizontalSpacing / verticalSpacing must be finite numbers >= 0 when set
 *   - preferredSpacing must be a function when set
 */

import { anchorForAlignment } from "./alignment.js";
import type { FlowAlignment } from "./alignment.js";
import { defaultPreferredDistance } from "./flow/spacing.js";
import type { PreferredSpacingFn } from "./flow/types.js";
import type { UnitPoint } from "./types.js";

/** Fatal error type for invalid flow layout props. */
export type InvalidPropsFatal = Readonly<{ code: "FLOW_INVALID_PROPS"; detail: string }>;

/** Success with a value, or failure with a fatal error. */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidPropsFatal }>;

export type FlowLayoutProps = Readonly<{
  /** Placement of rows in the container and of items in their row. Default "center". */
  alignment?: FlowAlignment;
  /** Fixed distance between items in a row. Unset: ask `preferredSpacing` per pair. */
  horizontalSpacing?: number;
  /** Fixed distance between rows. Unset: ask `preferredSpacing` per pair. */
  verticalSpacing?: number;
  /** Host "preferred distance" between two adjacent items. */
  preferredSpacing?: PreferredSpacingFn;
}>;

export type ValidatedFlowLayoutProps = Readonly<{
  alignment: string;
  anchor: UnitPoint;
  horizontalSpacing: number | undefined;
  verticalSpacing: number | undefined;
  preferredSpacing: PreferredSpacingFn;
}>;

type FlowLayoutPropBag = Readonly<{
  alignment?: unknown;
  horizontalSpacing?: unknown;
  verticalSpacing?: unknown;
  preferredSpacing?: unknown;
}>;

function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

function invalid(detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code: "FLOW_INVALID_PROPS", detail } };
}

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function invalidProp(name: string, expected: string, received: unknown): LayoutResult<never> {
  return invalid(
    `Invalid prop "${name}" on <flow>: expected ${expected}, ` +
      `got ${describeReceivedType(received)} (${String(received)})`,
  );
}

function requireOptionalSpacing(name: string, v: unknown): LayoutResult<number | undefined> {
  if (v === undefined || v === null) return ok(undefined);
  if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
    return invalidProp(name, "a finite number >= 0", v);
  }
  return ok(v);
}

function isPreferredSpacingFn(v: unknown): v is PreferredSpacingFn {
  return typeof v === "function";
}

export function validateFlowLayoutProps(
  props: FlowLayoutProps | unknown,
): LayoutResult<ValidatedFlowLayoutProps> {
  if (props !== undefined && props !== null && typeof props !== "object") {
    return invalidProp("props", "an object", props);
  }
  const p = (props ?? {}) as FlowLayoutPropBag;

  const alignment = p.alignment ?? "center";
  if (typeof alignment !== "string") {
    return invalidProp("alignment", "an alignment name", alignment);
  }

  const hRes = requireOptionalSpacing("horizontalSpacing", p.horizontalSpacing);
  if (!hRes.ok) return hRes;
  const vRes = requireOptionalSpacing("verticalSpacing", p.verticalSpacing);
  if (!vRes.ok) return vRes;

  let preferredSpacing: PreferredSpacingFn = defaultPreferredDistance;
  if (p.preferredSpacing !== undefined) {
    if (!isPreferredSpacingFn(p.preferredSpacing)) {
      return invalidProp("preferredSpacing", "a function", p.preferredSpacing);
    }
    preferredSpacing = p.preferredSpacing;
  }

  return ok(
    Object.freeze({
      alignment,
      anchor: anchorForAlignment(alignment),
      horizontalSpacing: hRes.value,
      verticalSpacing: vRes.value,
      preferredSpacing,
    }),
  );
}
