// ============================================================================
// NfcScope — Server Configuration
// ============================================================================
import * as path from 'path';

export interface ServerConfig {
  port: number;
  refreshMs: number;
  bufferCapacity: number;
  decoder: { host: string; port: number } | null;
  dataDir: string;
  utc: boolean;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const decoderPort = intFromEnv(env.NFC_DECODER_PORT, 0);

  return {
    port: intFromEnv(env.PORT, 3410),
    refreshMs: Math.max(10, intFromEnv(env.NFC_REFRESH_MS, 250)),
    bufferCapacity: intFromEnv(env.NFC_BUFFER_CAPACITY, 0),
    decoder: decoderPort > 0 ? { host: env.NFC_DECODER_HOST || '127.0.0.1', port: decoderPort } : null,
    dataDir: path.resolve(env.NFC_DATA_DIR || path.join(process.cwd(), 'data')),
    utc: env.NFC_TIME_UTC === '1' || env.NFC_TIME_UTC === 'true',
  };
}
