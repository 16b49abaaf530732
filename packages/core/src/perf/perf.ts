/**
 * packages/core/src/perf/perf.ts — Lightweight perf instrumentation.
 *
 * Opt-in via WRAPFLOW_PERF=1 environment variable. Zero-cost when disabled.
 */

/** Phases of a flow layout pass. */
export type InstrumentationPhase =
  | "flow_min_size"
  | "flow_measure"
  | "flow_pack"
  | "flow_stack"
  | "flow_place";

export const PERF_PHASES: readonly InstrumentationPhase[] = Object.freeze([
  "flow_min_size",
  "flow_measure",
  "flow_pack",
  "flow_stack",
  "flow_place",
]);

/** Statistics for a single phase. */
export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  max: number;
}>;

/** Aggregated perf snapshot. */
export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in InstrumentationPhase]?: PhaseStats }>;
}>;

/** Token returned by markStart for timing correlation. */
export type PerfToken = number;

/**
 * Check if perf mode is enabled.
 * Uses globalThis.process to avoid Node.js imports in core.
 */
export const PERF_ENABLED: boolean = (() => {
  const g = globalThis as { process?: { env?: { WRAPFLOW_PERF?: string } } };
  return g.process?.env?.WRAPFLOW_PERF === "1";
})();

function defaultClock(): number {
  const g = globalThis as { performance?: { now?: () => number } };
  const perf = g.performance;
  return typeof perf?.now === "function" ? perf.now() : Date.now();
}

/** Maximum samples kept per phase (ring buffer). */
const RING_CAP = 512;

type PhaseRing = {
  samples: Float64Array;
  cursor: number;
  count: number;
  sum: number;
  max: number;
};

function createPhaseRing(): PhaseRing {
  return { samples: new Float64Array(RING_CAP), cursor: 0, count: 0, sum: 0, max: 0 };
}

function recordSample(ring: PhaseRing, dt: number): void {
  if (ring.count >= RING_CAP) {
    ring.sum -= ring.samples[ring.cursor] ?? 0;
  }
  ring.samples[ring.cursor] = dt;
  ring.sum += dt;
  ring.cursor = (ring.cursor + 1) % RING_CAP;
  ring.count = Math.min(ring.count + 1, RING_CAP);
  if (dt > ring.max) ring.max = dt;
}

function computeStats(ring: PhaseRing): PhaseStats | null {
  if (ring.count === 0) return null;

  const arr = Array.from(ring.samples.subarray(0, ring.count)).sort((a, b) => a - b);
  const p50Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.5));
  const p95Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.95));

  return Object.freeze({
    count: ring.count,
    avg: ring.sum / ring.count,
    p50: arr[p50Idx] ?? 0,
    p95: arr[p95Idx] ?? 0,
    max: ring.max,
  });
}

/** Per-phase timing aggregator. The module-level helpers share one instance. */
export class PerfAggregator {
  private readonly rings = new Map<InstrumentationPhase, PhaseRing>();
  private readonly clock: () => number;

  constructor(clock: () => number = defaultClock) {
    this.clock = clock;
  }

  markStart(): PerfToken {
    return this.clock();
  }

  markEnd(phase: InstrumentationPhase, token: PerfToken): void {
    this.record(phase, this.clock() - token);
  }

  /** Record a duration directly (for cases where timing is computed elsewhere). */
  record(phase: InstrumentationPhase, durationMs: number): void {
    let ring = this.rings.get(phase);
    if (!ring) {
      ring = createPhaseRing();
      this.rings.set(phase, ring);
    }
    recordSample(ring, durationMs);
  }

  snapshot(): PerfSnapshot {
    const phases: { [K in InstrumentationPhase]?: PhaseStats } = {};
    for (const p of PERF_PHASES) {
      const ring = this.rings.get(p);
      const stats = ring ? computeStats(ring) : null;
      if (stats) phases[p] = stats;
    }
    return Object.freeze({ phases: Object.freeze(phases) });
  }

  reset(): void {
    this.rings.clear();
  }
}

let globalAggregator: PerfAggregator | null = null;

function getAggregator(): PerfAggregator {
  if (!globalAggregator) {
    globalAggregator = new PerfAggregator();
  }
  return globalAggregator;
}

/**
 * Mark the start of a phase. Returns a token to pass to perfMarkEnd.
 * No-op when perf is disabled.
 */
export function perfMarkStart(): PerfToken {
  if (!PERF_ENABLED) return 0;
  return getAggregator().markStart();
}

/** Mark the end of a phase. No-op when perf is disabled. */
export function perfMarkEnd(phase: InstrumentationPhase, token: PerfToken): void {
  if (!PERF_ENABLED) return;
  getAggregator().markEnd(phase, token);
}

/** Snapshot of collected timings; empty when perf is disabled. */
export function perfSnapshot(): PerfSnapshot {
  if (!PERF_ENABLED) {
    return Object.freeze({ phases: Object.freeze({}) });
  }
  return getAggregator().snapshot();
}

/** Reset all perf data. No-op when perf is disabled. */
export function perfReset(): void {
  if (!PERF_ENABLED) return;
  getAggregator().reset();
}
