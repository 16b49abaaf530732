/**
 * packages/core/src/layout/alignment.ts — Alignment anchors and placement.
 *
 * Why: Alignment is applied when items are placed, never while rows are
 * packed or stacked, so the packed rows stay alignment-independent and can be
 * cached. Each row is shifted inside the container width, and each item inside
 * its row's height, by a fractional anchor.
 *
 * Only the nine compass points have a table entry. Composite alignments
 * (text baselines) and anything unknown resolve to the center anchor.
 */

import type { FlowRow, FlowRowElement } from "./flow/types.js";
import type { Point, Rect, UnitPoint } from "./types.js";

export type CompassAlignment =
  | "topLeading"
  | "top"
  | "topTrailing"
  | "leading"
  | "center"
  | "trailing"
  | "bottomLeading"
  | "bottom"
  | "bottomTrailing";

export type BaselineAlignment =
  | "leadingFirstTextBaseline"
  | "centerFirstTextBaseline"
  | "trailingFirstTextBaseline"
  | "leadingLastTextBaseline"
  | "centerLastTextBaseline"
  | "trailingLastTextBaseline";

export type FlowAlignment = CompassAlignment | BaselineAlignment;

export const CENTER_ANCHOR: UnitPoint = Object.freeze({ x: 0.5, y: 0.5 });

export const ALIGNMENT_ANCHORS: Readonly<Record<CompassAlignment, UnitPoint>> = Object.freeze({
  topLeading: Object.freeze({ x: 0, y: 0 }),
  top: Object.freeze({ x: 0.5, y: 0 }),
  topTrailing: Object.freeze({ x: 1, y: 0 }),
  leading: Object.freeze({ x: 0, y: 0.5 }),
  center: CENTER_ANCHOR,
  trailing: Object.freeze({ x: 1, y: 0.5 }),
  bottomLeading: Object.freeze({ x: 0, y: 1 }),
  bottom: Object.freeze({ x: 0.5, y: 1 }),
  bottomTrailing: Object.freeze({ x: 1, y: 1 }),
});

const BASELINE_ALIGNMENTS: ReadonlySet<string> = new Set<BaselineAlignment>([
  "leadingFirstTextBaseline",
  "centerFirstTextBaseline",
  "trailingFirstTextBaseline",
  "leadingLastTextBaseline",
  "centerLastTextBaseline",
  "trailingLastTextBaseline",
]);

const DEV_MODE =
  ((globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
    "development") !== "production";

const warnedAlignments = new Set<string>();

function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function isCompassAlignment(value: unknown): value is CompassAlignment {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(ALIGNMENT_ANCHORS, value);
}

export function isFlowAlignment(value: unknown): value is FlowAlignment {
  return isCompassAlignment(value) || (typeof value === "string" && BASELINE_ALIGNMENTS.has(value));
}

/**
 * Anchor for an alignment value. Composite and unknown values map to center;
 * an unknown value also logs a one-time dev warning.
 */
export function anchorForAlignment(alignment: unknown): UnitPoint {
  if (isCompassAlignment(alignment)) return ALIGNMENT_ANCHORS[alignment];
  if (!isFlowAlignment(alignment)) {
    const label = String(alignment);
    if (!warnedAlignments.has(label)) {
      warnedAlignments.add(label);
      warnDev(`[wrapflow] unknown alignment "${label}", using center`);
    }
  }
  return CENTER_ANCHOR;
}

/**
 * Top-left position of `element` within `bounds`.
 *
 * The row is offset by `anchor.x` of the width it leaves unused in `bounds`,
 * the element by `anchor.y` of the height it leaves unused in its row.
 */
export function resolveElementPosition(
  element: FlowRowElement,
  row: FlowRow,
  anchor: UnitPoint,
  bounds: Rect,
): Point {
  const x = element.x + anchor.x * (bounds.w - row.w);
  const y = row.y + anchor.y * (row.h - element.size.h);
  return Object.freeze({ x: x + bounds.x, y: y + bounds.y });
}
