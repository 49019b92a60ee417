// ============================================================================
// NfcScope — Frame Store
// ============================================================================
import type { NfcFrame, StoredFrame } from '@nfcscope/shared';

/**
 * Append-only, row-indexed frame list. Rows are 0-based, never change once
 * assigned and restart at 0 after reset().
 *
 * Each stored frame holds a frozen copy of its payload, so neither the
 * producer nor a reader can change a frame after it is stored.
 */
export class FrameStore {
  private frames: StoredFrame[] = [];

  appendBatch(frames: readonly NfcFrame[]): StoredFrame[] {
    const added: StoredFrame[] = [];
    for (const frame of frames) {
      const stored: StoredFrame = Object.freeze({
        ...frame,
        data: Object.freeze(Array.from(frame.data)),
        index: this.frames.length,
      });
      this.frames.push(stored);
      added.push(stored);
    }
    return added;
  }

  rowCount(): number {
    return this.frames.length;
  }

  frameAt(row: number): StoredFrame | null {
    if (!Number.isInteger(row) || row < 0 || row >= this.frames.length) return null;
    return this.frames[row];
  }

  previousOf(row: number): StoredFrame | null {
    return this.frameAt(row - 1);
  }

  /** Empty for a negative offset or a limit below 1. */
  slice(offset = 0, limit = this.frames.length): StoredFrame[] {
    if (offset < 0 || limit < 1) return [];
    return this.frames.slice(offset, offset + limit);
  }

  /** Rows whose frame lies entirely inside [from, to], in row order. */
  rangeQuery(from: number, to: number): number[] {
    const rows: number[] = [];
    for (let i = 0; i < this.frames.length; i++) {
      const frame = this.frames[i];
      if (frame.timeStart >= from && frame.timeEnd <= to) rows.push(i);
    }
    return rows;
  }

  reset(): void {
    this.frames = [];
  }
}
