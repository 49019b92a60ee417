import type { NfcFrame } from '@nfcscope/shared';

export type FrameInit = Partial<Omit<NfcFrame, 'data'>> & { data?: number[] };

export function nfcFrame(init: FrameInit = {}): NfcFrame {
  return {
    tech: 'NfcA',
    type: 'Poll',
    timeStart: 0,
    timeEnd: 0,
    dateTime: 0,
    rate: 105938,
    flags: 0,
    ...init,
    data: Uint8Array.from(init.data ?? []),
  };
}

/** A frame spanning [timeStart, timeEnd]. */
export const span = (timeStart: number, timeEnd: number, init: FrameInit = {}) =>
  nfcFrame({ data: [0x26], ...init, timeStart, timeEnd });

/** REQA / ATQA / SEL1 / UID starting at `t`. */
export function anticollision(t = 0): NfcFrame[] {
  return [
    nfcFrame({ type: 'Poll', data: [0x26], timeStart: t, timeEnd: t + 0.0001 }),
    nfcFrame({ type: 'Listen', data: [0x44, 0x00], timeStart: t + 0.0002, timeEnd: t + 0.0003 }),
    nfcFrame({ type: 'Poll', data: [0x93, 0x20], timeStart: t + 0.001, timeEnd: t + 0.0011 }),
    nfcFrame({ type: 'Listen', data: [0x04, 0x6e, 0x2a, 0x81, 0xc1], timeStart: t + 0.0012, timeEnd: t + 0.0015 }),
  ];
}
