// ============================================================================
// NfcScope — Frame Event Classifier
// Maps a frame and its predecessor to protocol event labels
// ============================================================================
import { FRAME_TYPE_CODES, FrameFlags, hasFlag, isListenFrame, isPollFrame } from './nfc.js';
import type { FrameEvent, NfcFrame } from './nfc.js';
import { formatDelta, formatRate, formatTech } from './format.js';

type CommandTable = Readonly<Partial<Record<number, string>>>;

// ISO/IEC 14443-3 anticollision plus MIFARE Ultralight / Classic commands
export const NFCA_COMMANDS: CommandTable = Object.freeze({
  0x1a: 'AUTH',        // Ultralight C
  0x1b: 'PWD_AUTH',    // Ultralight EV1
  0x26: 'REQA',
  0x30: 'READ',
  0x39: 'READ_CNT',
  0x3a: 'FAST_READ',
  0x3c: 'READ_SIG',
  0x3e: 'TEARING',
  0x4b: 'VCSL',
  0x50: 'HLTA',
  0x52: 'WUPA',
  0x60: 'AUTH',        // Classic key A
  0x61: 'AUTH',        // Classic key B
  0x93: 'SEL1',
  0x95: 'SEL2',
  0x97: 'SEL3',
  0xa0: 'COMP_WRITE',
  0xa2: 'WRITE',
  0xa5: 'INCR_CNT',
  0xe0: 'RATS',
});

// Keyed by the command of the preceding poll frame
export const NFCA_RESPONSES: CommandTable = Object.freeze({
  0x26: 'ATQA',
  0x52: 'ATQA',
});

export const NFCB_COMMANDS: CommandTable = Object.freeze({
  0x05: 'REQB',
  0x1d: 'ATTRIB',
  0x50: 'HLTB',
});

export const NFCB_RESPONSES: CommandTable = Object.freeze({
  0x05: 'ATQB',
});

export const NFCF_COMMANDS: CommandTable = Object.freeze({
  0x00: 'REQC',
});

export const NFCF_RESPONSES: CommandTable = Object.freeze({
  0x00: 'ATQC',
});

// ISO/IEC 15693
export const NFCV_COMMANDS: CommandTable = Object.freeze({
  0x01: 'Inventory',
  0x02: 'StayQuiet',
  0x20: 'ReadBlock',
  0x21: 'WriteBlock',
  0x22: 'LockBlock',
  0x23: 'ReadBlocks',
  0x24: 'WriteBlocks',
  0x25: 'Select',
  0x26: 'Reset',
  0x27: 'WriteAFI',
  0x28: 'LockAFI',
  0x29: 'WriteDSFID',
  0x2a: 'LockDSFID',
  0x2b: 'SysInfo',
  0x2c: 'GetSecurity',
});

const SELECT_COMMANDS = new Set([0x93, 0x95, 0x97]);

const RATS = 0xe0;

/** Reads one payload octet, or null when the payload is too short. */
function byteAt(frame: NfcFrame, offset: number): number | null {
  return offset < frame.data.length ? frame.data[offset] : null;
}

function lookup(table: CommandTable, command: number): string | null {
  return table[command] ?? null;
}

function unknownCommand(command: number): string {
  return `CMD ${command.toString(16).padStart(2, '0')}`;
}

/**
 * ISO-DEP (ISO/IEC 14443-4) block framing. Rules are tested in this exact
 * order: the S(Deselect) and S(WTX) masks are subsets of the S-Block mask,
 * and R(ACK) / R(NACK) of the R-Block mask.
 */
export function classifyIsoDep(frame: NfcFrame): string | null {
  const command = byteAt(frame, 0);
  if (command === null) return null;

  const length = frame.data.length;

  if ((command & 0xf7) === 0xc2 && length >= 3 && length <= 4) return 'S(Deselect)';
  if ((command & 0xf7) === 0xf2 && length >= 3 && length <= 4) return 'S(WTX)';
  if ((command & 0xf6) === 0xa2 && length === 3) return 'R(ACK)';
  if ((command & 0xf6) === 0xb2 && length === 3) return 'R(NACK)';
  if ((command & 0xe2) === 0x02 && length >= 4) return 'I-Block';
  if ((command & 0xe6) === 0xa2 && length === 3) return 'R-Block';
  if ((command & 0xc7) === 0xc2 && length >= 3 && length <= 4) return 'S-Block';

  return null;
}

function eventNfcA(frame: NfcFrame, previous: NfcFrame | null): string | null {
  if (hasFlag(frame, FrameFlags.Encrypted)) return null;

  if (isPollFrame(frame)) {
    const command = byteAt(frame, 0);
    if (command === null) return null;

    const length = frame.data.length;

    if (command === 0x50 && length === 4) return 'HALT';
    if ((command & 0xf0) === 0xd0 && length === 5) return 'PPS';

    return classifyIsoDep(frame) ?? lookup(NFCA_COMMANDS, command);
  }

  if (!isListenFrame(frame) || !previous || !isPollFrame(previous)) return null;

  const command = byteAt(previous, 0);
  if (command === null) return null;

  const length = frame.data.length;

  if (SELECT_COMMANDS.has(command)) {
    if (length === 3) return 'SAK';
    if (length === 5) return 'UID';
  }

  if (command === RATS && byteAt(frame, 0) === length - 2) return 'ATS';

  return classifyIsoDep(frame) ?? lookup(NFCA_RESPONSES, command);
}

function eventNfcB(frame: NfcFrame): string | null {
  const command = byteAt(frame, 0);
  if (command === null) return null;

  if (isPollFrame(frame)) return classifyIsoDep(frame) ?? lookup(NFCB_COMMANDS, command);
  if (isListenFrame(frame)) return classifyIsoDep(frame) ?? lookup(NFCB_RESPONSES, command);

  return null;
}

function eventNfcF(frame: NfcFrame): string | null {
  // byte 0 carries the frame length, the command code follows it
  const command = byteAt(frame, 1);
  if (command === null) return null;

  if (isPollFrame(frame)) return lookup(NFCF_COMMANDS, command) ?? unknownCommand(command);
  if (isListenFrame(frame)) return lookup(NFCF_RESPONSES, command);

  return null;
}

function eventNfcV(frame: NfcFrame): string | null {
  if (!isPollFrame(frame)) return null;

  // byte 0 carries the request flags
  const command = byteAt(frame, 1);
  if (command === null) return null;

  return lookup(NFCV_COMMANDS, command) ?? unknownCommand(command);
}

/** Protocol event label for a frame, or null when no rule matches. */
export function frameEvent(frame: NfcFrame, previous: NfcFrame | null): string | null {
  if (frame.type === 'CarrierOn') return 'RF-On';
  if (frame.type === 'CarrierOff') return 'RF-Off';

  switch (frame.tech) {
    case 'NfcA':
      return eventNfcA(frame, previous);
    case 'NfcB':
      return eventNfcB(frame);
    case 'NfcF':
      return eventNfcF(frame);
    case 'NfcV':
      return eventNfcV(frame);
    default:
      return null;
  }
}

export function frameFlags(frame: NfcFrame): number {
  return (frame.flags << 8) | FRAME_TYPE_CODES[frame.type];
}

/**
 * Classifies one frame. The only context used is the frame immediately
 * before it in the stream, passed in by the caller.
 */
export function classifyFrame(frame: NfcFrame, previous: NfcFrame | null = null): FrameEvent {
  return {
    event: frameEvent(frame, previous),
    flags: frameFlags(frame),
    rate: formatRate(frame),
    delta: formatDelta(frame, previous),
    tech: formatTech(frame),
  };
}
