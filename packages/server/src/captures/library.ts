import type BetterSqlite3 from 'better-sqlite3';
import { parseFrame, serializeFrame } from '@nfcscope/shared';
import type { CaptureInfo, NfcFrame } from '@nfcscope/shared';

interface CaptureRecord {
  id: string;
  name: string;
  frame_count: number;
  time_start: number | null;
  time_end: number | null;
  created_at: number;
}

interface FrameRecord {
  frame: string;
}

function toInfo(r: CaptureRecord): CaptureInfo {
  return {
    id: r.id,
    name: r.name,
    frameCount: r.frame_count,
    timeStart: r.time_start,
    timeEnd: r.time_end,
    createdAt: r.created_at,
  };
}

/**
 * Capture library — named snapshots of the frame stream kept in SQLite.
 * Frames are stored one per row in their wire (JSON) form.
 */
export class CaptureLibrary {
  private insertCapture: BetterSqlite3.Statement<[string, string, number, number | null, number | null, number]>;
  private insertFrame: BetterSqlite3.Statement<[string, number, string]>;
  private selectAll: BetterSqlite3.Statement<[], CaptureRecord>;
  private selectOne: BetterSqlite3.Statement<[string], CaptureRecord>;
  private selectFrames: BetterSqlite3.Statement<[string], FrameRecord>;
  private deleteCapture: BetterSqlite3.Statement<[string]>;

  constructor(private db: BetterSqlite3.Database) {
    this.insertCapture = db.prepare<[string, string, number, number | null, number | null, number]>('INSERT INTO captures (id, name, frame_count, time_start, time_end, created_at) VALUES (?, ?, ?, ?, ?, ?)');
    this.insertFrame = db.prepare<[string, number, string]>('INSERT INTO capture_frames (capture_id, row, frame) VALUES (?, ?, ?)');
    this.selectAll = db.prepare<[], CaptureRecord>('SELECT * FROM captures ORDER BY created_at DESC, rowid DESC');
    this.selectOne = db.prepare<[string], CaptureRecord>('SELECT * FROM captures WHERE id = ?');
    this.selectFrames = db.prepare<[string], FrameRecord>('SELECT frame FROM capture_frames WHERE capture_id = ? ORDER BY row');
    this.deleteCapture = db.prepare<[string]>('DELETE FROM captures WHERE id = ?');
  }

  save(name: string, frames: readonly NfcFrame[]): CaptureInfo {
    const id = `cap-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;
    const createdAt = Date.now();
    const timeStart = frames.length ? frames.reduce((min, f) => Math.min(min, f.timeStart), Infinity) : null;
    const timeEnd = frames.length ? frames.reduce((max, f) => Math.max(max, f.timeEnd), -Infinity) : null;

    const transaction = this.db.transaction(() => {
      this.insertCapture.run(id, name, frames.length, timeStart, timeEnd, createdAt);
      frames.forEach((frame, row) => {
        this.insertFrame.run(id, row, JSON.stringify(serializeFrame(frame)));
      });
    });
    transaction();

    console.log(`💾 Saved capture "${name}" (${frames.length} frames)`);
    return { id, name, frameCount: frames.length, timeStart, timeEnd, createdAt };
  }

  list(): CaptureInfo[] {
    return this.selectAll.all().map(toInfo);
  }

  get(id: string): CaptureInfo | null {
    const r = this.selectOne.get(id);
    return r ? toInfo(r) : null;
  }

  frames(id: string): NfcFrame[] | null {
    if (!this.selectOne.get(id)) return null;
    return this.selectFrames.all(id).map((r) => parseFrame(JSON.parse(r.frame)));
  }

  remove(id: string): boolean {
    return this.deleteCapture.run(id).changes > 0;
  }
}
