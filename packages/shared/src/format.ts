// ============================================================================
// NfcScope — Frame Label Formatting
// ============================================================================
import { FLAG_NAMES, isListenFrame, isPollFrame } from './nfc.js';
import type { FlagName, NfcFrame, TimeFormat } from './nfc.js';

export interface TimeFormatOptions {
  utc?: boolean;
}

const FLAG_ORDER: FlagName[] = ['encrypted', 'crc', 'parity', 'sync'];

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** Gap between the end of the previous frame and the start of this one. */
export function formatDelta(frame: NfcFrame, previous: NfcFrame | null): string | null {
  if (!previous) return null;

  const elapsed = frame.timeStart - previous.timeEnd;

  if (elapsed < 20e-3) return `${(elapsed * 1e6).toFixed(0)} us`;
  if (elapsed < 1) return `${(elapsed * 1e3).toFixed(0)} ms`;

  return `${elapsed.toFixed(0)} s`;
}

export function formatRate(frame: NfcFrame): string | null {
  if (!isPollFrame(frame) && !isListenFrame(frame)) return null;
  return `${(frame.rate / 1000).toFixed(0)}k`;
}

export function formatTech(frame: NfcFrame): string | null {
  return frame.tech === 'None' ? null : frame.tech;
}

/**
 * Row timestamp. `elapsed` shows seconds since capture start with
 * microsecond precision, `datetime` shows the absolute wall-clock time
 * as `yy-MM-dd hh:mm:ss.zzz`.
 */
export function formatFrameTime(frame: NfcFrame, mode: TimeFormat, options: TimeFormatOptions = {}): string {
  if (mode === 'elapsed') return frame.timeStart.toFixed(6);

  const seconds = Math.trunc(frame.dateTime);
  const millis = Math.trunc((frame.dateTime - seconds) * 1e3);
  const date = new Date(seconds * 1000);

  const parts = options.utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()];

  const [year, month, day, hours, minutes, secs] = parts;

  return `${pad(year % 100)}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:${pad(secs)}.${pad(millis, 3)}`;
}

export function formatFrameData(frame: NfcFrame): string {
  return Array.from(frame.data, (b) => b.toString(16).padStart(2, '0')).join(' ');
}

export function describeFlags(flags: number): FlagName[] {
  return FLAG_ORDER.filter((name) => (flags & FLAG_NAMES[name]) !== 0);
}
