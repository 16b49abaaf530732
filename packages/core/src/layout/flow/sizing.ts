import { ZERO_PROPOSAL } from "../proposal.js";
import type { ProposedSize, Size } from "../types.js";
import type { FlowSubview } from "./types.js";

const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });

/**
 * Ask every subview for its size under `proposal`, in input order.
 * Each `sizeThatFits` runs exactly once; packing only reads the returned array.
 */
export function measureSubviews(subviews: readonly FlowSubview[], proposal: ProposedSize): Size[] {
  const sizes = new Array<Size>(subviews.length);
  for (let i = 0; i < subviews.length; i++) {
    const subview = subviews[i];
    sizes[i] = subview ? subview.sizeThatFits(proposal) : ZERO_SIZE;
  }
  return sizes;
}

/**
 * Componentwise maximum of every subview's size under a zero proposal.
 * Used as a floor: a proposal smaller than this on either axis cannot be laid out.
 */
export function computeMinSize(subviews: readonly FlowSubview[]): Size {
  let w = 0;
  let h = 0;
  for (const subview of subviews) {
    const size = subview.sizeThatFits(ZERO_PROPOSAL);
    if (size.w > w) w = size.w;
    if (size.h > h) h = size.h;
  }
  return w === 0 && h === 0 ? ZERO_SIZE : Object.freeze({ w, h });
}
