import { assert, describe, test } from "@wrapflow/testkit";
import { PerfAggregator, perfReset, perfSnapshot } from "../perf.js";

function fakeClock(times: readonly number[]): () => number {
  let i = 0;
  return () => times[i++] ?? 0;
}

describe("PerfAggregator", () => {
  test("markStart/markEnd record the clock delta", () => {
    const agg = new PerfAggregator(fakeClock([10, 14, 20, 30]));
    const a = agg.markStart();
    agg.markEnd("flow_pack", a);
    const b = agg.markStart();
    agg.markEnd("flow_pack", b);

    assert.deepEqual(agg.snapshot().phases.flow_pack, {
      count: 2,
      avg: 7,
      p50: 10,
      p95: 10,
      max: 10,
    });
  });

  test("phases are tracked independently", () => {
    const agg = new PerfAggregator();
    agg.record("flow_measure", 2);
    agg.record("flow_stack", 6);

    const { phases } = agg.snapshot();
    assert.equal(phases.flow_measure?.max, 2);
    assert.equal(phases.flow_stack?.max, 6);
    assert.equal(phases.flow_place, undefined);
  });

  test("percentiles come from sorted samples", () => {
    const agg = new PerfAggregator();
    for (const v of [5, 1, 4, 2, 3]) agg.record("flow_place", v);
    const stats = agg.snapshot().phases.flow_place;
    assert.equal(stats?.p50, 3);
    assert.equal(stats?.p95, 5);
    assert.equal(stats?.avg, 3);
  });

  test("ring keeps the latest 512 samples", () => {
    const agg = new PerfAggregator();
    for (let i = 0; i < 600; i++) agg.record("flow_min_size", i < 88 ? 100 : 1);
    const stats = agg.snapshot().phases.flow_min_size;
    assert.equal(stats?.count, 512);
    assert.equal(stats?.avg, 1);
    // max is all-time, not windowed
    assert.equal(stats?.max, 100);
  });

  test("reset clears every phase", () => {
    const agg = new PerfAggregator();
    agg.record("flow_pack", 1);
    agg.reset();
    assert.deepEqual(agg.snapshot().phases, {});
  });
});

describe("module helpers", () => {
  test("reset leaves an empty snapshot", () => {
    perfReset();
    assert.deepEqual(perfSnapshot().phases, {});
  });

  test("a fresh aggregator reports no phases", () => {
    assert.deepEqual(new PerfAggregator().snapshot().phases, {});
  });
});
