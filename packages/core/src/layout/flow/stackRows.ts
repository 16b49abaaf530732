import { dimensionOr } from "../proposal.js";
import type { ProposedSize, Size } from "../types.js";
import type { FlowRow, FlowRowElement, PackedRow, PairSpacingFn } from "./types.js";

/** Tallest element of a row; the first one wins when heights tie. */
function findTallest(elements: readonly FlowRowElement[]): FlowRowElement | undefined {
  let tallest: FlowRowElement | undefined;
  for (const element of elements) {
    if (!tallest || element.size.h > tallest.size.h) tallest = element;
  }
  return tallest;
}

/**
 * Assign each row its top edge and height.
 *
 * Vertical spacing is resolved between the tallest elements of consecutive
 * rows, so per-item preferences of the items that define row heights apply.
 */
export function stackRows(packed: readonly PackedRow[], vspacing: PairSpacingFn): FlowRow[] {
  const rows: FlowRow[] = [];
  let cursorY = 0;
  let previousTallest: number | null = null;

  for (const row of packed) {
    const tallest = findTallest(row.elements);
    if (!tallest) continue;

    const spacing = previousTallest === null ? 0 : vspacing(previousTallest, tallest.index);
    const y = cursorY + spacing;
    const h = tallest.size.h;

    rows.push(Object.freeze({ elements: row.elements, w: row.w, y, h, tallest: tallest.index }));
    cursorY += h + spacing;
    previousTallest = tallest.index;
  }

  return rows;
}

/**
 * Bounding size of stacked rows.
 *
 * Width is the widest row, widened to a finite proposed width. Height is the
 * bottom edge of the last row. No rows measure (0,0).
 */
export function contentSize(rows: readonly FlowRow[], proposal: ProposedSize): Size {
  const last = rows[rows.length - 1];
  if (!last) return Object.freeze({ w: 0, h: 0 });

  let w = 0;
  for (const row of rows) {
    if (row.w > w) w = row.w;
  }
  return Object.freeze({ w: Math.max(w, dimensionOr(proposal.w, 0)), h: last.y + last.h });
}
