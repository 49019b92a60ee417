import { FrameStore } from '../src/stream/store.js';
import { nfcFrame, span } from './helpers.js';

describe('FrameStore', () => {
  it('assigns sequential rows starting at 0', () => {
    const store = new FrameStore();
    const first = store.appendBatch([span(1, 2), span(3, 4)]);
    const second = store.appendBatch([span(5, 6)]);

    expect(first.map((f) => f.index)).toEqual([0, 1]);
    expect(second.map((f) => f.index)).toEqual([2]);
    expect(store.rowCount()).toBe(3);
    expect(store.frameAt(2)?.timeStart).toBe(5);
  });

  it('returns null outside the stored rows', () => {
    const store = new FrameStore();
    store.appendBatch([span(1, 2)]);

    expect(store.frameAt(-1)).toBeNull();
    expect(store.frameAt(1)).toBeNull();
    expect(store.frameAt(0.5)).toBeNull();
    expect(store.previousOf(0)).toBeNull();
    expect(store.previousOf(1)?.index).toBe(0);
  });

  it('stores frozen frames', () => {
    const store = new FrameStore();
    const [stored] = store.appendBatch([span(1, 2)]);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('keeps its own frozen copy of each payload', () => {
    const store = new FrameStore();
    const payload = Uint8Array.from([0x26]);
    const [stored] = store.appendBatch([{ ...nfcFrame(), data: payload }]);

    payload[0] = 0x52;
    expect(Array.from(stored.data)).toEqual([0x26]);

    expect(Object.isFrozen(stored.data)).toBe(true);
    expect(Reflect.set(stored.data, 0, 0xe0)).toBe(false);
    expect(Array.from(store.frameAt(0)?.data ?? [])).toEqual([0x26]);
  });

  it('queries rows lying entirely inside an inclusive interval', () => {
    const store = new FrameStore();
    store.appendBatch([span(1, 2), span(5, 11), span(9, 9.5)]);

    expect(store.rangeQuery(0, 10)).toEqual([0, 2]);
    expect(store.rangeQuery(1, 2)).toEqual([0]);
    expect(store.rangeQuery(5, 11)).toEqual([1, 2]);
    expect(store.rangeQuery(20, 30)).toEqual([]);
  });

  it('pages through rows', () => {
    const store = new FrameStore();
    store.appendBatch([span(1, 1), span(2, 2), span(3, 3), span(4, 4)]);

    expect(store.slice(1, 2).map((f) => f.index)).toEqual([1, 2]);
    expect(store.slice(3).map((f) => f.index)).toEqual([3]);
  });

  it('returns an empty page for a negative offset or a limit below 1', () => {
    const store = new FrameStore();
    store.appendBatch([span(1, 1), span(2, 2), span(3, 3), span(4, 4), span(5, 5)]);

    expect(store.slice(-2, 500)).toEqual([]);
    expect(store.slice(0, 0)).toEqual([]);
    expect(store.slice(1, -1)).toEqual([]);
  });

  it('restarts rows at 0 after reset', () => {
    const store = new FrameStore();
    store.appendBatch([span(1, 2), span(3, 4)]);
    store.reset();

    expect(store.rowCount()).toBe(0);
    expect(store.appendBatch([span(7, 8)])[0].index).toBe(0);
  });
});
