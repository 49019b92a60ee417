import type { NfcFrame } from '../src/nfc.js';

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

export const poll = (data: number[], init: FrameInit = {}) => nfcFrame({ type: 'Poll', ...init, data });
export const listen = (data: number[], init: FrameInit = {}) => nfcFrame({ type: 'Listen', ...init, data });
