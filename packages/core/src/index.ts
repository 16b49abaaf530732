/**
 * @wrapflow/core
 *
 * Wrapping flow layout: items are placed left to right and wrap onto new rows
 * when the proposed width runs out. Runtime-agnostic; no node:* imports.
 */

// =============================================================================
// Errors
// =============================================================================

export { FlowLayoutError, type FlowLayoutErrorCode } from "./errors.js";

// =============================================================================
// Geometry and proposals
// =============================================================================

export type {
  Axis,
  Dimension,
  Point,
  ProposedSize,
  Rect,
  Size,
  UnitPoint,
} from "./layout/types.js";

export {
  UNCONSTRAINED,
  UNSPECIFIED_PROPOSAL,
  ZERO_PROPOSAL,
  dimensionOr,
  exceedsDimension,
  finite,
  fitsWithin,
  proposeSize,
} from "./layout/proposal.js";

// =============================================================================
// Alignment
// =============================================================================

export {
  ALIGNMENT_ANCHORS,
  CENTER_ANCHOR,
  anchorForAlignment,
  isCompassAlignment,
  isFlowAlignment,
  resolveElementPosition,
  type BaselineAlignment,
  type CompassAlignment,
  type FlowAlignment,
} from "./layout/alignment.js";

// =============================================================================
// Props validation
// =============================================================================

export {
  validateFlowLayoutProps,
  type FlowLayoutProps,
  type InvalidPropsFatal,
  type LayoutResult,
  type ValidatedFlowLayoutProps,
} from "./layout/validateProps.js";

// =============================================================================
// Flow layout
// =============================================================================

export type {
  FlowLayoutProperties,
  FlowLayoutStats,
  FlowMeasurement,
  FlowPlacement,
  FlowRow,
  FlowRowElement,
  FlowSubview,
  PackedRow,
  PairSpacingFn,
  PlacementAnchor,
  PreferredSpacingFn,
  SpacingPreferences,
} from "./layout/flow/types.js";

export { createFlowLayoutEngine, type FlowLayoutEngine } from "./layout/flow/flowLayout.js";
export { computeMinSize, measureSubviews } from "./layout/flow/sizing.js";
export {
  DEFAULT_ITEM_SPACING,
  createPairSpacing,
  defaultPreferredDistance,
} from "./layout/flow/spacing.js";
export { packRows } from "./layout/flow/packRows.js";
export { contentSize, stackRows } from "./layout/flow/stackRows.js";
export {
  computeFingerprint,
  fingerprintsEqual,
  type LayoutFingerprint,
} from "./layout/flow/fingerprint.js";
export { FlowLayoutCache } from "./layout/flow/layoutCache.js";

// =============================================================================
// Perf instrumentation
// =============================================================================

export {
  PERF_ENABLED,
  PERF_PHASES,
  PerfAggregator,
  perfMarkEnd,
  perfMarkStart,
  perfReset,
  perfSnapshot,
  type InstrumentationPhase,
  type PerfSnapshot,
  type PerfToken,
  type PhaseStats,
} from "./perf/perf.js";
