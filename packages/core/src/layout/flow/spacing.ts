/**
 * Spacing resolution between adjacent flow items.
 *
 * A configured scalar override wins. Without one, the pair is asked for its
 * preferred distance, which by default is derived from each item's own
 * per-edge preferences.
 */

import type { Axis } from "../types.js";
import type { FlowSubview, PairSpacingFn, PreferredSpacingFn } from "./types.js";

/** Edge preference assumed when an item does not state one. */
export const DEFAULT_ITEM_SPACING = 8;

/**
 * Preferred distance between `prev` and `next`: the larger of the two facing
 * edge preferences (trailing/leading along a row, bottom/top along a column).
 */
export function defaultPreferredDistance(
  prev: FlowSubview,
  next: FlowSubview,
  axis: Axis,
): number {
  const a = prev.spacing;
  const b = next.spacing;
  if (axis === "row") {
    return Math.max(a?.trailing ?? DEFAULT_ITEM_SPACING, b?.leading ?? DEFAULT_ITEM_SPACING);
  }
  return Math.max(a?.bottom ?? DEFAULT_ITEM_SPACING, b?.top ?? DEFAULT_ITEM_SPACING);
}

/**
 * Build the pairwise spacing function the packer (row axis) or stacker
 * (column axis) consumes.
 */
export function createPairSpacing(
  subviews: readonly FlowSubview[],
  axis: Axis,
  override: number | undefined,
  preferred: PreferredSpacingFn,
): PairSpacingFn {
  if (override !== undefined) return () => override;
  return (prevIndex, nextIndex) => {
    const prev = subviews[prevIndex];
    const next = subviews[nextIndex];
    if (!prev || !next) return 0;
    return preferred(prev, next, axis);
  };
}
