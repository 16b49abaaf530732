import { exceedsDimension } from "../proposal.js";
import type { Dimension, Size } from "../types.js";
import type { FlowRowElement, PackedRow, PairSpacingFn } from "./types.js";

function closeRow(elements: FlowRowElement[], cursorX: number): PackedRow {
  return Object.freeze({ elements: Object.freeze(elements), w: cursorX });
}

/**
 * Pack items into rows, left to right, in a single pass.
 *
 * - An item that would overflow a non-empty row starts a new row.
 * - An item wider than `availableWidth` on its own is always alone in its row:
 *   the open row is closed before it and its row is closed right after it.
 * - Unconstrained width never wraps, so the result is a single row.
 *
 * Spacing is queried against the last item of the open row, if any. It is
 * discarded when the item wraps.
 */
export function packRows(
  sizes: readonly Size[],
  availableWidth: Dimension,
  hspacing: PairSpacingFn,
): PackedRow[] {
  const rows: PackedRow[] = [];
  let elements: FlowRowElement[] = [];
  let cursorX = 0;

  for (let index = 0; index < sizes.length; index++) {
    const size = sizes[index];
    if (!size) continue;

    const last = elements[elements.length - 1];
    let spacing = last ? hspacing(last.index, index) : 0;
    const oversized = exceedsDimension(size.w, availableWidth);

    if (oversized && elements.length > 0) {
      rows.push(closeRow(elements, cursorX));
      elements = [];
      cursorX = 0;
      spacing = 0;
    }

    if (elements.length > 0 && exceedsDimension(cursorX + size.w + spacing, availableWidth)) {
      rows.push(closeRow(elements, cursorX));
      elements = [];
      cursorX = 0;
      spacing = 0;
    }

    elements.push(Object.freeze({ index, size, x: cursorX + spacing }));
    cursorX += size.w + spacing;

    if (oversized) {
      rows.push(closeRow(elements, cursorX));
      elements = [];
      cursorX = 0;
    }
  }

  if (elements.length > 0) {
    rows.push(closeRow(elements, cursorX));
  }

  return rows;
}
