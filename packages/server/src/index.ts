import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import * as path from 'path';
import type { FrameRow, TimeFormat } from '@nfcscope/shared';
import { loadConfig } from './config.js';
import { StreamService } from './stream/service.js';
import { DecoderFeed } from './decoders/feed.js';
import { CaptureLibrary } from './captures/library.js';
import { openDatabase } from './services/database.js';
import { createApp, VERSION } from './api/app.js';

const config = loadConfig();

// Services
const stream = new StreamService({ refreshMs: config.refreshMs, bufferCapacity: config.bufferCapacity, utc: config.utc });
const library = new CaptureLibrary(openDatabase(path.join(config.dataDir, 'nfcscope.db')));
const feed = config.decoder ? new DecoderFeed((frame) => stream.push(frame), config.decoder) : null;

const app = createApp({ stream, library, feed, dataDir: config.dataDir });
const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Broadcast to all WS clients
function broadcast(data: unknown) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

stream.on('frames', (rows: FrameRow[]) => broadcast({ type: 'frames', rows }));
stream.on('reset', (generation: number) => broadcast({ type: 'reset', generation }));
stream.on('format', (mode: TimeFormat) => broadcast({ type: 'format', mode }));

wss.on('connection', (ws: WebSocket) => {
  console.log('⚡ Client connected');

  // Send initial state
  ws.send(JSON.stringify({ type: 'stats', stats: stream.stats() }));

  ws.on('error', (err) => {
    console.warn(`⚡ Client error: ${err.message}`);
  });

  ws.on('close', () => {
    console.log('⚡ Client disconnected');
  });
});

stream.start();
feed?.start();

function shutdown() {
  stream.stop();
  feed?.stop();
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

server.listen(config.port, '0.0.0.0', () => {
  console.log(`
  ⚡ NfcScope v${VERSION}
  ⚡ HTTP:    http://0.0.0.0:${config.port}
  ⚡ WS:      ws://0.0.0.0:${config.port}/ws
  ⚡ Decoder: ${config.decoder ? `${config.decoder.host}:${config.decoder.port}` : 'disabled (POST /api/frames)'}
  `);
});
