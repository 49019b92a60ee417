import { EventEmitter } from 'events';
import * as net from 'net';
import { parseFrame } from '@nfcscope/shared';
import type { NfcFrame } from '@nfcscope/shared';

export interface DecoderFeedOptions {
  host: string;
  port: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
}

export interface DecoderFeedStatus {
  host: string;
  port: number;
  connected: boolean;
  framesReceived: number;
  malformedLines: number;
  lastError: string | null;
  reconnectCount: number;
  nextRetryMs: number;
}

/**
 * Decoder feed — reads newline-delimited JSON frames from an external NFC
 * decoder over TCP and hands each valid frame to the sink.
 * Reconnects with exponential backoff: initialBackoffMs (1s) doubling up to
 * maxBackoffMs (30s), back to the initial delay once connected.
 *
 * Events: 'connected', 'disconnected', 'reconnecting' (delayMs),
 * 'frame' (frame), 'malformed' (line, message).
 */
export class DecoderFeed extends EventEmitter {
  private client: net.Socket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private connected = false;
  private running = false;
  private backoffMs: number;
  private buffer = '';
  private framesReceived = 0;
  private malformedLines = 0;
  private lastError: string | null = null;
  private reconnectCount = 0;

  constructor(private sink: (frame: NfcFrame) => void, private options: DecoderFeedOptions) {
    super();
    this.backoffMs = this.initialBackoffMs();
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.connect();
  }

  stop() {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.client) {
      this.client.destroy();
      this.client = null;
    }
    this.connected = false;
  }

  isConnected(): boolean { return this.connected; }

  getStatus(): DecoderFeedStatus {
    return {
      host: this.options.host,
      port: this.options.port,
      connected: this.connected,
      framesReceived: this.framesReceived,
      malformedLines: this.malformedLines,
      lastError: this.lastError,
      reconnectCount: this.reconnectCount,
      nextRetryMs: this.backoffMs,
    };
  }

  private connect() {
    const { host, port } = this.options;
    const client = new net.Socket();
    this.client = client;
    this.buffer = '';
    client.setEncoding('utf8');

    client.connect(port, host, () => {
      this.connected = true;
      this.backoffMs = this.initialBackoffMs();
      console.log(`🔌 Decoder feed connected to ${host}:${port}`);
      this.emit('connected');
    });

    client.on('data', (chunk: string) => {
      this.buffer += chunk;
      const lines = this.buffer.split('\n');
      this.buffer = lines.pop() || '';
      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) this.handleLine(trimmed);
      }
    });

    client.on('error', (err) => {
      this.lastError = err.message;
    });

    client.on('close', () => {
      const wasConnected = this.connected;
      this.connected = false;
      if (this.client === client) this.client = null;
      if (wasConnected) {
        console.log(`🔌 Decoder feed disconnected from ${host}:${port}`);
        this.emit('disconnected');
      }
      if (this.running) this.scheduleReconnect();
    });
  }

  private handleLine(line: string) {
    let frame: NfcFrame;
    try {
      frame = parseFrame(JSON.parse(line));
    } catch (err) {
      this.malformedLines++;
      this.lastError = err instanceof Error ? err.message : String(err);
      this.emit('malformed', line, this.lastError);
      return;
    }
    this.framesReceived++;
    this.sink(frame);
    this.emit('frame', frame);
  }

  private scheduleReconnect() {
    if (this.reconnectTimer) return;
    this.reconnectCount++;
    console.log(`🔌 Decoder feed reconnecting in ${this.backoffMs}ms (attempt ${this.reconnectCount})`);
    this.emit('reconnecting', this.backoffMs);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) this.connect();
    }, this.backoffMs);
    this.backoffMs = Math.min(this.backoffMs * 2, this.options.maxBackoffMs ?? 30000);
  }

  private initialBackoffMs(): number {
    return Math.min(this.options.initialBackoffMs ?? 1000, this.options.maxBackoffMs ?? 30000);
  }
}
