/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types shared by the flow layout engine. Sizes and
 * offsets are plain floating-point units; the host decides what a unit means.
 */

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height). */
export type Size = Readonly<{ w: number; h: number }>;

/** Absolute or origin-relative position. */
export type Point = Readonly<{ x: number; y: number }>;

/** Layout axis: row (horizontal) or column (vertical). */
export type Axis = "row" | "column";

/**
 * One axis of a size proposal.
 *
 * Unconstrained is its own variant rather than `Infinity` so that an
 * unbounded limit never leaks into offset arithmetic.
 */
export type Dimension =
  | Readonly<{ kind: "finite"; value: number }>
  | Readonly<{ kind: "unconstrained" }>;

/** Size proposed by a parent. Each axis is independently finite or unconstrained. */
export type ProposedSize = Readonly<{ w: Dimension; h: Dimension }>;

/** Fractional anchor inside a rectangle: (0,0) top-leading, (1,1) bottom-trailing. */
export type UnitPoint = Readonly<{ x: number; y: number }>;
