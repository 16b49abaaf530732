import type { Size } from "../types.js";
import { type LayoutFingerprint, fingerprintsEqual } from "./fingerprint.js";
import type { FlowRow } from "./types.js";

type CacheEntry = Readonly<{
  fingerprint: LayoutFingerprint;
  rows: readonly FlowRow[];
}>;

/**
 * Engine-owned cache: the min-size floor plus a single entry holding the most
 * recently computed rows. A new entry always replaces the old one whole.
 */
export class FlowLayoutCache {
  minSize: Size | null = null;
  private entry: CacheEntry | null = null;
  private hitCount = 0;
  private missCount = 0;

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  /** Stored rows when `fingerprint` matches the entry, otherwise null. */
  lookup(fingerprint: LayoutFingerprint): readonly FlowRow[] | null {
    const entry = this.entry;
    if (entry !== null && fingerprintsEqual(entry.fingerprint, fingerprint)) {
      this.hitCount++;
      return entry.rows;
    }
    this.missCount++;
    return null;
  }

  store(fingerprint: LayoutFingerprint, rows: readonly FlowRow[]): readonly FlowRow[] {
    const frozen = Object.isFrozen(rows) ? rows : Object.freeze([...rows]);
    this.entry = Object.freeze({ fingerprint, rows: frozen });
    return frozen;
  }

  /** Drop both the min size and the stored rows. Counters are kept. */
  invalidate(): void {
    this.minSize = null;
    this.entry = null;
  }
}
