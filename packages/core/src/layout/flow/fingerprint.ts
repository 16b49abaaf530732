/**
 * Content fingerprint for the flow layout cache.
 *
 * The fingerprint covers the proposal and every measured item size, in order.
 * Unconstrained axes are normalized to a single `Infinity` sentinel before
 * hashing. The normalized key is kept next to the hash, and equality checks
 * both, so two different inputs never compare equal on a hash collision.
 */

import type { Dimension, ProposedSize, Size } from "../types.js";

export type LayoutFingerprint = Readonly<{
  hash: number;
  key: Float64Array;
}>;

const FNV_OFFSET = 2166136261;
const FNV_PRIME = 16777619;

// Shared scratch view for reading the IEEE-754 words of a double.
const scratch = new Float64Array(1);
const scratchWords = new Uint32Array(scratch.buffer);

function mixHash(hash: number, value: number): number {
  return Math.imul(hash ^ value, FNV_PRIME) >>> 0;
}

function mixNumber(hash: number, value: number): number {
  scratch[0] = value;
  return mixHash(mixHash(hash, scratchWords[0] ?? 0), scratchWords[1] ?? 0);
}

function normalize(value: number): number {
  // -0 and 0 lay out identically.
  return value === 0 ? 0 : value;
}

function dimensionKey(dim: Dimension): number {
  return dim.kind === "finite" ? normalize(dim.value) : Number.POSITIVE_INFINITY;
}

export function computeFingerprint(
  proposal: ProposedSize,
  sizes: readonly Size[],
): LayoutFingerprint {
  const key = new Float64Array(2 + sizes.length * 2);
  key[0] = dimensionKey(proposal.w);
  key[1] = dimensionKey(proposal.h);
  for (let i = 0; i < sizes.length; i++) {
    const size = sizes[i];
    key[2 + i * 2] = size ? normalize(size.w) : 0;
    key[3 + i * 2] = size ? normalize(size.h) : 0;
  }

  let hash = FNV_OFFSET >>> 0;
  for (let i = 0; i < key.length; i++) {
    hash = mixNumber(hash, key[i] ?? 0);
  }
  return Object.freeze({ hash, key });
}

export function fingerprintsEqual(a: LayoutFingerprint, b: LayoutFingerprint): boolean {
  if (a === b) return true;
  if (a.hash !== b.hash || a.key.length !== b.key.length) return false;
  for (let i = 0; i < a.key.length; i++) {
    if (a.key[i] !== b.key[i]) return false;
  }
  return true;
}
