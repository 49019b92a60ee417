// ============================================================================
// NfcScope API Routes
// ============================================================================

import { Router } from 'express';
import * as path from 'path';
import { FrameFormatError, parseFrame } from '@nfcscope/shared';
import type { NfcFrame, TimeFormat } from '@nfcscope/shared';
import type { StreamService } from '../stream/service.js';
import type { CaptureLibrary } from '../captures/library.js';
import { readCaptureFile, writeCaptureFile } from '../captures/file.js';

const TIME_FORMATS: readonly TimeFormat[] = ['elapsed', 'datetime'];

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function parseRow(value: string): number | null {
  return /^\d+$/.test(value) ? parseInt(value, 10) : null;
}

export function createStreamRouter(stream: StreamService): Router {
  const router = Router();

  router.get('/stream/stats', (_req, res) => {
    res.json(stream.stats());
  });

  router.post('/stream/reset', (_req, res) => {
    stream.reset();
    res.json(stream.stats());
  });

  // List labelled rows (paged)
  router.get('/frames', (req, res) => {
    const offset = parseInt(String(req.query.offset)) || 0;
    const limit = parseInt(String(req.query.limit)) || 500;
    if (offset < 0 || limit < 0) return res.status(400).json({ error: 'offset and limit must not be negative' });
    res.json({ total: stream.rowCount(), offset, rows: stream.rows(offset, limit) });
  });

  // Rows fully inside a time interval
  router.get('/frames/range', (req, res) => {
    const from = parseFloat(String(req.query.from));
    const to = parseFloat(String(req.query.to));
    if (Number.isNaN(from) || Number.isNaN(to)) {
      return res.status(400).json({ error: 'from and to are required numbers (seconds)' });
    }
    res.json(stream.range(from, to));
  });

  router.get('/frames/:row', (req, res) => {
    const n = parseRow(req.params.row);
    const row = n === null ? null : stream.row(n);
    if (!row) return res.status(404).json({ error: 'Frame not found' });
    res.json(row);
  });

  router.get('/frames/:row/exchange', (req, res) => {
    const n = parseRow(req.params.row);
    const exchange = n === null ? null : stream.exchange(n);
    if (!exchange) return res.status(404).json({ error: 'No poll/listen exchange at this row' });
    res.json(exchange);
  });

  // Ingest one frame or an array of frames; visible after the next refresh
  router.post('/frames', (req, res) => {
    const body: unknown = req.body;
    let frames: NfcFrame[];
    try {
      frames = Array.isArray(body) ? body.map((f: unknown) => parseFrame(f)) : [parseFrame(body)];
    } catch (e) {
      return res.status(400).json({ error: errorMessage(e) });
    }
    stream.pushAll(frames);
    res.status(202).json({ accepted: frames.length });
  });

  router.get('/display/time-format', (_req, res) => {
    res.json({ mode: stream.getTimeFormat() });
  });

  router.put('/display/time-format', (req, res) => {
    const mode = TIME_FORMATS.find((m) => m === req.body?.mode);
    if (!mode) return res.status(400).json({ error: `mode must be one of ${TIME_FORMATS.join(', ')}` });
    stream.setTimeFormat(mode);
    res.json({ mode });
  });

  return router;
}

export function createCaptureRouter(stream: StreamService, library: CaptureLibrary, dataDir: string): Router {
  const router = Router();

  // Capture files are only read from / written to the data directory
  const resolveDataFile = (name: unknown): string | null => {
    if (typeof name !== 'string' || !name) return null;
    const file = path.resolve(dataDir, name);
    const relative = path.relative(dataDir, file);
    return relative && !relative.startsWith('..') && !path.isAbsolute(relative) ? file : null;
  };

  router.get('/captures', (_req, res) => {
    res.json(library.list());
  });

  // Snapshot the current stream
  router.post('/captures', (req, res) => {
    const name = typeof req.body?.name === 'string' && req.body.name.trim()
      ? req.body.name.trim()
      : `record-${new Date().toISOString()}`;
    res.status(201).json(library.save(name, stream.frames()));
  });

  router.post('/captures/import', async (req, res) => {
    const file = resolveDataFile(req.body?.file);
    if (!file) return res.status(400).json({ error: 'file must name a capture inside the data directory' });
    try {
      const frames = await readCaptureFile(file);
      const rows = stream.load(frames);
      console.log(`💾 Loaded ${rows} frames from ${file}`);
      res.json(stream.stats());
    } catch (e) {
      const status = e instanceof FrameFormatError || e instanceof SyntaxError ? 400 : isMissingFile(e) ? 404 : 500;
      res.status(status).json({ error: errorMessage(e) });
    }
  });

  router.post('/captures/export', async (req, res) => {
    const file = resolveDataFile(req.body?.file);
    if (!file) return res.status(400).json({ error: 'file must name a capture inside the data directory' });
    try {
      const frames = stream.frames();
      await writeCaptureFile(file, frames);
      res.json({ file: path.relative(dataDir, file), frames: frames.length });
    } catch (e) {
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  router.get('/captures/:id', (req, res) => {
    const capture = library.get(req.params.id);
    if (!capture) return res.status(404).json({ error: 'Capture not found' });
    res.json(capture);
  });

  // Replace the stream with a stored capture
  router.post('/captures/:id/load', (req, res) => {
    const frames = library.frames(req.params.id);
    if (!frames) return res.status(404).json({ error: 'Capture not found' });
    stream.load(frames);
    res.json(stream.stats());
  });

  router.delete('/captures/:id', (req, res) => {
    if (!library.remove(req.params.id)) return res.status(404).json({ error: 'Capture not found' });
    res.json({ success: true });
  });

  return router;
}
