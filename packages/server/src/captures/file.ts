import * as fs from 'fs/promises';
import { FrameFormatError, parseFrame, serializeFrame } from '@nfcscope/shared';
import type { NfcFrame } from '@nfcscope/shared';

/** Reads a `{ "frames": [...] }` capture file. */
export async function readCaptureFile(file: string): Promise<NfcFrame[]> {
  const content: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));

  if (typeof content !== 'object' || content === null || !('frames' in content) || !Array.isArray(content.frames)) {
    throw new FrameFormatError(`${file}: missing "frames" array`);
  }

  return content.frames.map((entry: unknown, i: number) => {
    try {
      return parseFrame(entry);
    } catch (err) {
      if (err instanceof FrameFormatError) {
        throw new FrameFormatError(`${file}: frame ${i}: ${err.message}`, err.field);
      }
      throw err;
    }
  });
}

export async function writeCaptureFile(file: string, frames: readonly NfcFrame[]): Promise<void> {
  const content = { frames: frames.map(serializeFrame) };
  await fs.writeFile(file, JSON.stringify(content, null, 2));
}
