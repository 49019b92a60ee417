// ============================================================================
// NfcScope — Presentation Rows
// ============================================================================
import type { FrameRow, NfcFrame, TimeFormat } from './nfc.js';
import { classifyFrame } from './classifier.js';
import { describeFlags, formatFrameData, formatFrameTime, type TimeFormatOptions } from './format.js';

/** Everything a frame table shows for one row, as plain values. */
export function labelRow(
  row: number,
  frame: NfcFrame,
  previous: NfcFrame | null,
  mode: TimeFormat = 'elapsed',
  options: TimeFormatOptions = {},
): FrameRow {
  return {
    row,
    time: formatFrameTime(frame, mode, options),
    type: frame.type,
    data: formatFrameData(frame),
    errors: describeFlags(frame.flags),
    ...classifyFrame(frame, previous),
  };
}
