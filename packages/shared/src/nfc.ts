// ============================================================================
// NfcScope Frame Types
// ============================================================================

export type NfcTech = 'NfcA' | 'NfcB' | 'NfcF' | 'NfcV' | 'None';

export type FrameType = 'CarrierOff' | 'CarrierOn' | 'Poll' | 'Listen';

export type FlagName = 'encrypted' | 'parity' | 'crc' | 'sync';

export type TimeFormat = 'elapsed' | 'datetime';

// Direction codes packed into the low byte of the row flag word
export const FRAME_TYPE_CODES: Record<FrameType, number> = {
  CarrierOff: 0,
  CarrierOn: 1,
  Poll: 2,
  Listen: 3,
};

export const TECH_CODES: Record<NfcTech, number> = {
  None: 0,
  NfcA: 1,
  NfcB: 2,
  NfcF: 3,
  NfcV: 4,
};

export const FrameFlags = {
  Encrypted: 0x02,
  ParityError: 0x10,
  CrcError: 0x20,
  SyncError: 0x40,
} as const;

export const FLAG_NAMES: Record<FlagName, number> = {
  encrypted: FrameFlags.Encrypted,
  parity: FrameFlags.ParityError,
  crc: FrameFlags.CrcError,
  sync: FrameFlags.SyncError,
};

/** A decoded air frame as delivered by the demodulator. */
export interface NfcFrame {
  readonly tech: NfcTech;
  readonly type: FrameType;
  readonly data: ArrayLike<number>; // octets, read-only through this type
  readonly timeStart: number;  // seconds since capture start
  readonly timeEnd: number;
  readonly dateTime: number;   // epoch seconds, fraction holds sub-second part
  readonly rate: number;       // bits/second
  readonly flags: number;      // FrameFlags bits
}

/** A frame owned by the frame store, tagged with its row. */
export interface StoredFrame extends NfcFrame {
  readonly index: number;
}

export interface FrameEvent {
  event: string | null;
  flags: number;
  rate: string | null;
  delta: string | null;
  tech: string | null;
}

export interface FrameRow extends FrameEvent {
  row: number;
  time: string;
  type: FrameType;
  data: string;
  errors: FlagName[];
}

export interface FrameSpan {
  start: number;
  end: number;
}

export interface FrameExchange {
  poll: FrameRow;
  listen: FrameRow | null;
}

export interface StreamStats {
  rows: number;
  pending: number;
  accepted: number;
  dropped: number;
  generation: number;
  timeFormat: TimeFormat;
}

export interface CaptureInfo {
  id: string;
  name: string;
  frameCount: number;
  timeStart: number | null;
  timeEnd: number | null;
  createdAt: number;
}

export function isPollFrame(frame: NfcFrame): boolean {
  return frame.type === 'Poll';
}

export function isListenFrame(frame: NfcFrame): boolean {
  return frame.type === 'Listen';
}

export function hasFlag(frame: NfcFrame, flag: number): boolean {
  return (frame.flags & flag) !== 0;
}
