import express from 'express';
import cors from 'cors';
import type { Express } from 'express';
import type { StreamService } from '../stream/service.js';
import type { CaptureLibrary } from '../captures/library.js';
import type { DecoderFeed } from '../decoders/feed.js';
import { createCaptureRouter, createStreamRouter } from './routes.js';

export interface AppServices {
  stream: StreamService;
  library: CaptureLibrary;
  feed?: DecoderFeed | null;
  dataDir: string;
}

export const VERSION = '0.1.0';

export function createApp({ stream, library, feed, dataDir }: AppServices): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '16mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({
      name: 'NfcScope',
      version: VERSION,
      uptime: process.uptime(),
      status: 'operational',
      decoder: feed ? feed.getStatus() : null,
    });
  });

  app.use('/api', createStreamRouter(stream));
  app.use('/api', createCaptureRouter(stream, library, dataDir));

  return app;
}
