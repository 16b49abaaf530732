import type { Axis, Point, ProposedSize, Size } from "../types.js";

/**
 * Per-edge spacing preferences an item carries for its neighbours.
 * Missing edges fall back to DEFAULT_ITEM_SPACING.
 */
export type SpacingPreferences = Readonly<{
  leading?: number;
  trailing?: number;
  top?: number;
  bottom?: number;
}>;

/** Anchor the host should use when positioning a placed item. Always top-leading. */
export type PlacementAnchor = "topLeading";

/**
 * Host handle for one item in the flow.
 *
 * `sizeThatFits` is opaque and may be expensive; the engine calls it at most
 * once per item per pass.
 */
export type FlowSubview = Readonly<{
  sizeThatFits: (proposal: ProposedSize) => Size;
  spacing?: SpacingPreferences;
  place?: (position: Point, anchor: PlacementAnchor, proposal: ProposedSize) => void;
}>;

/** Host-level "preferred distance" between two adjacent items along an axis. */
export type PreferredSpacingFn = (prev: FlowSubview, next: FlowSubview, axis: Axis) => number;

/** Spacing between two items, addressed by their index in the input order. */
export type PairSpacingFn = (prevIndex: number, nextIndex: number) => number;

/** An item inside a row; `x` is relative to the row origin. */
export type FlowRowElement = Readonly<{
  index: number;
  size: Size;
  x: number;
}>;

/** Row produced by the packer, before vertical placement. */
export type PackedRow = Readonly<{
  elements: readonly FlowRowElement[];
  /** Sum of element widths plus the spacing between them. */
  w: number;
}>;

/** Row after stacking. */
export type FlowRow = PackedRow &
  Readonly<{
    /** Top edge within the content. */
    y: number;
    /** Height of the tallest element. */
    h: number;
    /** Input index of the element that defines `h` (first one on ties). */
    tallest: number;
  }>;

/** Final placement handed back to the host. */
export type FlowPlacement = Readonly<{
  index: number;
  position: Point;
  size: Size;
}>;

/** Result of size negotiation. */
export type FlowMeasurement = Readonly<{
  minSize: Size;
  fitSize: Size;
}>;

/** Layout properties the host may query before laying out. */
export type FlowLayoutProperties = Readonly<{
  stackOrientation: Axis;
}>;

/** Counters kept per engine instance. */
export type FlowLayoutStats = Readonly<{
  passes: number;
  cacheHits: number;
  cacheMisses: number;
  packs: number;
  minSizeRejects: number;
}>;
