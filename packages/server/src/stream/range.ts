// ============================================================================
// NfcScope — Range Indexer
// Correlates the frame store with time-domain views
// ============================================================================
import { isListenFrame, isPollFrame } from '@nfcscope/shared';
import type { FrameSpan } from '@nfcscope/shared';
import type { FrameStore } from './store.js';

export interface ExchangeRows {
  poll: number;
  listen: number | null;
}

export class RangeIndexer {
  constructor(private store: FrameStore) {}

  rowsInRange(from: number, to: number): number[] {
    return this.store.rangeQuery(from, to);
  }

  /** Time extent covered by a set of rows; rows outside the store are ignored. */
  selectionSpan(rows: readonly number[]): FrameSpan | null {
    let span: FrameSpan | null = null;
    for (const row of rows) {
      const frame = this.store.frameAt(row);
      if (!frame) continue;
      if (!span) {
        span = { start: frame.timeStart, end: frame.timeEnd };
      } else {
        span.start = Math.min(span.start, frame.timeStart);
        span.end = Math.max(span.end, frame.timeEnd);
      }
    }
    return span;
  }

  /**
   * The poll/listen pair a row belongs to. A poll pairs with the listen frame
   * right after it, a listen frame with the poll right before it.
   */
  exchangeAt(row: number): ExchangeRows | null {
    const frame = this.store.frameAt(row);
    if (!frame) return null;

    if (isPollFrame(frame)) {
      const next = this.store.frameAt(row + 1);
      return { poll: row, listen: next && isListenFrame(next) ? row + 1 : null };
    }

    if (isListenFrame(frame)) {
      const previous = this.store.previousOf(row);
      if (previous && isPollFrame(previous)) return { poll: row - 1, listen: row };
    }

    return null;
  }
}
