import * as path from 'path';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({ port: 3410, refreshMs: 250, bufferCapacity: 0, decoder: null, utc: false });
    expect(config.dataDir).toBe(path.resolve(process.cwd(), 'data'));
  });

  it('reads decoder and buffer settings', () => {
    const config = loadConfig({
      NFC_DECODER_PORT: '4555',
      NFC_BUFFER_CAPACITY: '1000',
      NFC_TIME_UTC: 'true',
      NFC_DATA_DIR: '/tmp/nfc',
    });
    expect(config.decoder).toEqual({ host: '127.0.0.1', port: 4555 });
    expect(config.bufferCapacity).toBe(1000);
    expect(config.utc).toBe(true);
    expect(config.dataDir).toBe(path.resolve('/tmp/nfc'));
  });

  it('clamps the refresh interval and ignores garbage', () => {
    expect(loadConfig({ NFC_REFRESH_MS: '1' }).refreshMs).toBe(10);
    expect(loadConfig({ PORT: 'abc', NFC_BUFFER_CAPACITY: '-5' })).toMatchObject({ port: 3410, bufferCapacity: 0 });
  });
});
