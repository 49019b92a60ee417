// ============================================================================
// NfcScope — Frame Ingestion Buffer
// Holds decoded frames between the producer and the periodic drain
// ============================================================================
import type { NfcFrame } from '@nfcscope/shared';

export interface IngestBufferStats {
  pending: number;
  accepted: number;
  dropped: number;
}

/**
 * FIFO queue with one producer (decoder feed, API ingestion) and one consumer
 * (the stream refresh). Every method runs to completion on the event loop, so
 * append, drain and reset never interleave.
 *
 * With a capacity > 0 the queue drops its oldest frame when full.
 */
export class FrameIngestBuffer {
  private queue: NfcFrame[] = [];
  private head = 0;
  private accepted = 0;
  private dropped = 0;

  constructor(private capacity = 0) {}

  append(frame: NfcFrame): void {
    if (this.capacity > 0 && this.size() >= this.capacity) {
      this.head++;
      this.dropped++;
      if (this.head >= this.capacity) {
        this.queue = this.queue.slice(this.head);
        this.head = 0;
      }
    }
    this.queue.push(frame);
    this.accepted++;
  }

  hasPending(): boolean {
    return this.size() > 0;
  }

  /** Removes and returns every queued frame in arrival order. */
  drain(): NfcFrame[] {
    const frames = this.head > 0 ? this.queue.slice(this.head) : this.queue;
    this.queue = [];
    this.head = 0;
    return frames;
  }

  reset(): void {
    this.queue = [];
    this.head = 0;
  }

  size(): number {
    return this.queue.length - this.head;
  }

  stats(): IngestBufferStats {
    return { pending: this.size(), accepted: this.accepted, dropped: this.dropped };
  }
}
