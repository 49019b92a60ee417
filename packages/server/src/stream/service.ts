// ============================================================================
// NfcScope — Stream Service
// Ingestion buffer + frame store + periodic refresh
// ============================================================================
import { EventEmitter } from 'events';
import { labelRow } from '@nfcscope/shared';
import type { FrameExchange, FrameRow, FrameSpan, NfcFrame, StoredFrame, StreamStats, TimeFormat } from '@nfcscope/shared';
import { FrameIngestBuffer } from './buffer.js';
import { FrameStore } from './store.js';
import { RangeIndexer } from './range.js';

export interface StreamServiceOptions {
  refreshMs?: number;
  bufferCapacity?: number;
  utc?: boolean;
}

export interface RangeResult {
  rows: FrameRow[];
  span: FrameSpan | null;
  generation: number;
}

/**
 * Events:
 *  - 'frames' (rows: FrameRow[]) after each refresh that moved frames into the store
 *  - 'reset'  (generation: number) once buffer and store have been cleared
 *  - 'format' (mode: TimeFormat) when the display time format changes
 */
export class StreamService extends EventEmitter {
  private buffer: FrameIngestBuffer;
  private store = new FrameStore();
  private ranges = new RangeIndexer(this.store);
  private timeFormat: TimeFormat = 'elapsed';
  private generation = 0;
  private refreshTimer: ReturnType<typeof setInterval> | null = null;
  private refreshMs: number;
  private utc: boolean;

  constructor(options: StreamServiceOptions = {}) {
    super();
    this.buffer = new FrameIngestBuffer(options.bufferCapacity ?? 0);
    this.refreshMs = options.refreshMs ?? 250;
    this.utc = options.utc ?? false;
  }

  start() {
    if (this.refreshTimer) return;
    this.refreshTimer = setInterval(() => this.refresh(), this.refreshMs);
    console.log(`📶 Stream refresh every ${this.refreshMs}ms`);
  }

  stop() {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
  }

  push(frame: NfcFrame): void {
    this.buffer.append(frame);
  }

  pushAll(frames: readonly NfcFrame[]): void {
    for (const frame of frames) this.buffer.append(frame);
  }

  /** Moves pending frames into the store. Returns the number of new rows. */
  refresh(): number {
    if (!this.buffer.hasPending()) return 0;

    const added = this.store.appendBatch(this.buffer.drain());
    if (added.length > 0) this.emit('frames', added.map((frame) => this.label(frame)));

    return added.length;
  }

  /** Clears queued and stored frames; range results computed before are stale. */
  reset(): void {
    this.buffer.reset();
    this.store.reset();
    this.generation++;
    console.log(`📶 Stream reset (generation ${this.generation})`);
    this.emit('reset', this.generation);
  }

  /** Replaces the stream contents with a recorded capture. */
  load(frames: readonly NfcFrame[]): number {
    this.reset();
    this.pushAll(frames);
    return this.refresh();
  }

  getTimeFormat(): TimeFormat {
    return this.timeFormat;
  }

  setTimeFormat(mode: TimeFormat): void {
    if (mode === this.timeFormat) return;
    this.timeFormat = mode;
    this.emit('format', mode);
  }

  rowCount(): number {
    return this.store.rowCount();
  }

  frameAt(row: number): StoredFrame | null {
    return this.store.frameAt(row);
  }

  frames(): StoredFrame[] {
    return this.store.slice();
  }

  rows(offset = 0, limit = 500): FrameRow[] {
    return this.store.slice(offset, limit).map((frame) => this.label(frame));
  }

  row(row: number): FrameRow | null {
    const frame = this.store.frameAt(row);
    return frame ? this.label(frame) : null;
  }

  range(from: number, to: number): RangeResult {
    const rows = this.ranges.rowsInRange(from, to);
    return {
      rows: rows.flatMap((n) => this.row(n) ?? []),
      span: this.ranges.selectionSpan(rows),
      generation: this.generation,
    };
  }

  exchange(row: number): FrameExchange | null {
    const pair = this.ranges.exchangeAt(row);
    if (!pair) return null;

    const poll = this.row(pair.poll);
    if (!poll) return null;

    return { poll, listen: pair.listen === null ? null : this.row(pair.listen) };
  }

  stats(): StreamStats {
    const { pending, accepted, dropped } = this.buffer.stats();
    return {
      rows: this.store.rowCount(),
      pending,
      accepted,
      dropped,
      generation: this.generation,
      timeFormat: this.timeFormat,
    };
  }

  private label(frame: StoredFrame): FrameRow {
    return labelRow(frame.index, frame, this.store.previousOf(frame.index), this.timeFormat, { utc: this.utc });
  }
}
