/**
 * packages/core/src/layout/flow/flowLayout.ts — Wrapping flow layout engine.
 *
 * Why: Lays items out left to right and wraps them onto new rows when the
 * proposed width runs out, the way inline text wraps. The host drives it with
 * two calls per layout pass:
 *   - measure(proposal, subviews): size negotiation (min size + best fit)
 *   - arrange(bounds, proposal, subviews): final positions, one per item
 *
 * Pass pipeline:
 *   1. Fast reject: a proposal smaller than the min size yields no rows.
 *   2. Sizing: every subview is measured once against the proposal.
 *   3. Cache: the proposal and sizes are fingerprinted; a match returns the
 *      stored rows and skips 4-5.
 *   4. Packing into rows (horizontal spacing per adjacent pair).
 *   5. Stacking rows (vertical spacing between the rows' tallest items).
 *   6. Alignment, at arrange time only.
 *
 * The engine instance owns its cache; one pass runs at a time.
 */

import { FlowLayoutError } from "../../errors.js";
import { perfMarkEnd, perfMarkStart } from "../../perf/perf.js";
import { resolveElementPosition } from "../alignment.js";
import { fitsWithin } from "../proposal.js";
import type { ProposedSize, Rect, Size } from "../types.js";
import {
  type FlowLayoutProps,
  type ValidatedFlowLayoutProps,
  validateFlowLayoutProps,
} from "../validateProps.js";
import { computeFingerprint } from "./fingerprint.js";
import { FlowLayoutCache } from "./layoutCache.js";
import { packRows } from "./packRows.js";
import { computeMinSize, measureSubviews } from "./sizing.js";
import { createPairSpacing } from "./spacing.js";
import { contentSize, stackRows } from "./stackRows.js";
import type {
  FlowLayoutProperties,
  FlowLayoutStats,
  FlowMeasurement,
  FlowPlacement,
  FlowRow,
  FlowSubview,
} from "./types.js";

export type FlowLayoutEngine = Readonly<{
  props: ValidatedFlowLayoutProps;
  properties: FlowLayoutProperties;
  /** Recompute the min size after the subview collection or its contents changed. */
  updateCache: (subviews: readonly FlowSubview[]) => void;
  /** Drop the min size and the stored rows. */
  resetCache: () => void;
  /** Packed and stacked rows for a proposal, served from the cache when unchanged. */
  rows: (proposal: ProposedSize, subviews: readonly FlowSubview[]) => readonly FlowRow[];
  measure: (proposal: ProposedSize, subviews: readonly FlowSubview[]) => FlowMeasurement;
  arrange: (
    bounds: Rect,
    proposal: ProposedSize,
    subviews: readonly FlowSubview[],
  ) => readonly FlowPlacement[];
  stats: () => FlowLayoutStats;
}>;

const FLOW_LAYOUT_PROPERTIES: FlowLayoutProperties = Object.freeze({ stackOrientation: "row" });
const NO_ROWS: readonly FlowRow[] = Object.freeze([]);
const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });

/**
 * Create a flow layout engine.
 *
 * @throws FlowLayoutError with code "FLOW_INVALID_PROPS" when props fail validation.
 */
export function createFlowLayoutEngine(props: FlowLayoutProps = {}): FlowLayoutEngine {
  const validated = validateFlowLayoutProps(props);
  if (!validated.ok) {
    throw new FlowLayoutError(validated.fatal.code, validated.fatal.detail);
  }
  const config = validated.value;
  const cache = new FlowLayoutCache();

  let passes = 0;
  let packs = 0;
  let minSizeRejects = 0;

  function refreshMinSize(subviews: readonly FlowSubview[]): Size {
    const token = perfMarkStart();
    const minSize = computeMinSize(subviews);
    perfMarkEnd("flow_min_size", token);
    cache.minSize = minSize;
    return minSize;
  }

  function arrangeRows(
    proposal: ProposedSize,
    subviews: readonly FlowSubview[],
  ): readonly FlowRow[] {
    passes++;
    if (subviews.length === 0) return NO_ROWS;

    const minSize = cache.minSize ?? refreshMinSize(subviews);
    if (!fitsWithin(minSize, proposal)) {
      minSizeRejects++;
      return NO_ROWS;
    }

    const measureToken = perfMarkStart();
    const sizes = measureSubviews(subviews, proposal);
    perfMarkEnd("flow_measure", measureToken);

    const fingerprint = computeFingerprint(proposal, sizes);
    const cached = cache.lookup(fingerprint);
    if (cached !== null) return cached;

    packs++;
    const packToken = perfMarkStart();
    const packed = packRows(
      sizes,
      proposal.w,
      createPairSpacing(subviews, "row", config.horizontalSpacing, config.preferredSpacing),
    );
    perfMarkEnd("flow_pack", packToken);

    const stackToken = perfMarkStart();
    const rows = stackRows(
      packed,
      createPairSpacing(subviews, "column", config.verticalSpacing, config.preferredSpacing),
    );
    perfMarkEnd("flow_stack", stackToken);

    return cache.store(fingerprint, rows);
  }

  function measure(proposal: ProposedSize, subviews: readonly FlowSubview[]): FlowMeasurement {
    const rows = arrangeRows(proposal, subviews);
    const minSize = cache.minSize ?? ZERO_SIZE;
    const fitSize = rows.length === 0 ? minSize : contentSize(rows, proposal);
    return Object.freeze({ minSize, fitSize });
  }

  function arrange(
    bounds: Rect,
    proposal: ProposedSize,
    subviews: readonly FlowSubview[],
  ): readonly FlowPlacement[] {
    const rows = arrangeRows(proposal, subviews);
    const token = perfMarkStart();
    const placements: FlowPlacement[] = [];

    for (const row of rows) {
      for (const element of row.elements) {
        const position = resolveElementPosition(element, row, config.anchor, bounds);
        placements.push(Object.freeze({ index: element.index, position, size: element.size }));
        subviews[element.index]?.place?.(position, "topLeading", proposal);
      }
    }

    perfMarkEnd("flow_place", token);
    return Object.freeze(placements);
  }

  return Object.freeze({
    props: config,
    properties: FLOW_LAYOUT_PROPERTIES,
    updateCache: (subviews: readonly FlowSubview[]) => {
      refreshMinSize(subviews);
    },
    resetCache: () => {
      cache.invalidate();
    },
    rows: arrangeRows,
    measure,
    arrange,
    stats: () =>
      Object.freeze({
        passes,
        cacheHits: cache.hits,
        cacheMisses: cache.misses,
        packs,
        minSizeRejects,
      }),
  });
}
