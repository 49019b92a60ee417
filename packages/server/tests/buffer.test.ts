import { FrameIngestBuffer } from '../src/stream/buffer.js';
import { span } from './helpers.js';

describe('FrameIngestBuffer', () => {
  it('drains queued frames in arrival order', () => {
    const buffer = new FrameIngestBuffer();
    const frames = [span(1, 2), span(3, 4), span(5, 6)];
    frames.forEach((f) => buffer.append(f));

    expect(buffer.hasPending()).toBe(true);
    expect(buffer.drain()).toEqual(frames);
    expect(buffer.hasPending()).toBe(false);
    expect(buffer.drain()).toEqual([]);
  });

  it('reset discards pending frames', () => {
    const buffer = new FrameIngestBuffer();
    buffer.append(span(1, 2));
    buffer.reset();

    expect(buffer.hasPending()).toBe(false);
    expect(buffer.stats()).toEqual({ pending: 0, accepted: 1, dropped: 0 });
  });

  it('is unbounded by default', () => {
    const buffer = new FrameIngestBuffer();
    for (let i = 0; i < 10000; i++) buffer.append(span(i, i));

    expect(buffer.size()).toBe(10000);
    expect(buffer.stats().dropped).toBe(0);
  });

  it('drops the oldest frames when bounded', () => {
    const buffer = new FrameIngestBuffer(3);
    for (let i = 0; i < 8; i++) buffer.append(span(i, i));

    expect(buffer.stats()).toEqual({ pending: 3, accepted: 8, dropped: 5 });
    expect(buffer.drain().map((f) => f.timeStart)).toEqual([5, 6, 7]);

    buffer.append(span(20, 20));
    expect(buffer.drain().map((f) => f.timeStart)).toEqual([20]);
  });
});
