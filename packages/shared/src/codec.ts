// ============================================================================
// NfcScope — Frame Wire Codec
// JSON form of a frame shared by capture files, the decoder feed and the API
// ============================================================================
import { FLAG_NAMES } from './nfc.js';
import type { FlagName, FrameType, NfcFrame, NfcTech } from './nfc.js';
import { describeFlags } from './format.js';

export interface FrameWire {
  tech: NfcTech;
  type: FrameType;
  data: string;
  timeStart: number;
  timeEnd: number;
  dateTime: number;
  rate: number;
  flags: FlagName[];
}

export class FrameFormatError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'FrameFormatError';
  }
}

// Index is the numeric code used by decoders that emit codes instead of names
const TECHS: readonly NfcTech[] = ['None', 'NfcA', 'NfcB', 'NfcF', 'NfcV'];
const FRAME_TYPES: readonly FrameType[] = ['CarrierOff', 'CarrierOn', 'Poll', 'Listen'];
const FLAGS: readonly FlagName[] = ['encrypted', 'parity', 'crc', 'sync'];

const KNOWN_FLAG_BITS = FLAGS.reduce((bits, name) => bits | FLAG_NAMES[name], 0);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseName<T extends string>(value: unknown, names: readonly T[], field: string): T {
  if (typeof value === 'number') {
    const byCode = Number.isInteger(value) ? names[value] : undefined;
    if (byCode !== undefined) return byCode;
  } else if (typeof value === 'string') {
    const byName = names.find((name) => name.toLowerCase() === value.toLowerCase());
    if (byName !== undefined) return byName;
  }
  throw new FrameFormatError(`Invalid ${field}: ${JSON.stringify(value)}`, field);
}

function parseNumber(value: unknown, field: string, fallback?: number): number {
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new FrameFormatError(`Invalid ${field}: ${JSON.stringify(value)}`, field);
  }
  return value;
}

/** Hex string ("26", "93 20", "9320") or an array of octets. */
export function parseHex(value: unknown): Uint8Array {
  if (Array.isArray(value)) {
    const octets = value.map((v) => (typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= 0xff ? v : -1));
    if (octets.includes(-1)) throw new FrameFormatError('Invalid data: octets must be integers in 0..255', 'data');
    return Uint8Array.from(octets);
  }

  if (typeof value !== 'string') throw new FrameFormatError('Invalid data: expected hex string', 'data');

  const hex = value.replace(/[\s:]/g, '');
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new FrameFormatError(`Invalid data: ${JSON.stringify(value)}`, 'data');
  }

  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

function parseFlags(value: unknown): number {
  if (value === undefined) return 0;

  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value & KNOWN_FLAG_BITS;

  if (Array.isArray(value)) {
    return value.reduce<number>((bits, name) => bits | FLAG_NAMES[parseName(name, FLAGS, 'flags')], 0);
  }

  throw new FrameFormatError(`Invalid flags: ${JSON.stringify(value)}`, 'flags');
}

/** Validates a decoded JSON value and builds a frame from it. */
export function parseFrame(value: unknown): NfcFrame {
  if (!isRecord(value)) throw new FrameFormatError('Frame must be a JSON object');

  const type = parseName(value.type, FRAME_TYPES, 'type');
  const carrier = type === 'CarrierOn' || type === 'CarrierOff';
  const tech = value.tech === undefined && carrier ? 'None' : parseName(value.tech, TECHS, 'tech');

  const timeStart = parseNumber(value.timeStart, 'timeStart');
  const timeEnd = parseNumber(value.timeEnd, 'timeEnd', timeStart);
  if (timeEnd < timeStart) {
    throw new FrameFormatError(`timeEnd (${timeEnd}) precedes timeStart (${timeStart})`, 'timeEnd');
  }

  return {
    tech,
    type,
    data: value.data === undefined && carrier ? new Uint8Array(0) : parseHex(value.data),
    timeStart,
    timeEnd,
    dateTime: parseNumber(value.dateTime, 'dateTime', 0),
    rate: parseNumber(value.rate, 'rate', 0),
    flags: parseFlags(value.flags),
  };
}

export function serializeFrame(frame: NfcFrame): FrameWire {
  return {
    tech: frame.tech,
    type: frame.type,
    data: Array.from(frame.data, (b) => b.toString(16).padStart(2, '0')).join(''),
    timeStart: frame.timeStart,
    timeEnd: frame.timeEnd,
    dateTime: frame.dateTime,
    rate: frame.rate,
    flags: describeFlags(frame.flags),
  };
}
