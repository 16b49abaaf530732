/**
 * packages/core/src/layout/proposal.ts — Size proposal helpers.
 *
 * Why: Parents negotiate sizes with children through proposals whose axes are
 * either a finite limit or unconstrained. These helpers build proposals and
 * answer the two questions layout asks of them: does a value exceed the limit,
 * and does a size fit inside it.
 */

import type { Dimension, ProposedSize, Size } from "./types.js";

export const UNCONSTRAINED: Dimension = Object.freeze({ kind: "unconstrained" });

/** Finite dimension. Non-finite input collapses to UNCONSTRAINED. */
export function finite(value: number): Dimension {
  if (!Number.isFinite(value)) return UNCONSTRAINED;
  return Object.freeze({ kind: "finite", value });
}

function toDimension(value: number | null | undefined): Dimension {
  if (value === null || value === undefined) return UNCONSTRAINED;
  return finite(value);
}

/**
 * Build a proposal from optional numbers.
 * `null`, `undefined` and non-finite values mean "unconstrained".
 */
export function proposeSize(w?: number | null, h?: number | null): ProposedSize {
  return Object.freeze({ w: toDimension(w), h: toDimension(h) });
}

/** Both axes 0: asks an item for its smallest size. */
export const ZERO_PROPOSAL: ProposedSize = proposeSize(0, 0);

/** Both axes unconstrained: asks an item for its ideal size. */
export const UNSPECIFIED_PROPOSAL: ProposedSize = proposeSize(null, null);

/** Value of a finite dimension, or `fallback` when unconstrained. */
export function dimensionOr(dim: Dimension, fallback: number): number {
  return dim.kind === "finite" ? dim.value : fallback;
}

/** True when `value` is strictly larger than a finite limit. Never true for unconstrained. */
export function exceedsDimension(value: number, dim: Dimension): boolean {
  return dim.kind === "finite" && value > dim.value;
}

/** True when `size` fits the proposal on both axes. */
export function fitsWithin(size: Size, proposal: ProposedSize): boolean {
  return !exceedsDimension(size.w, proposal.w) && !exceedsDimension(size.h, proposal.h);
}
