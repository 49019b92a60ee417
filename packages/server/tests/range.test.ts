import { FrameStore } from '../src/stream/store.js';
import { RangeIndexer } from '../src/stream/range.js';
import { anticollision, nfcFrame, span } from './helpers.js';

describe('RangeIndexer', () => {
  it('delegates interval queries to the store', () => {
    const store = new FrameStore();
    store.appendBatch([span(1, 2), span(5, 11), span(9, 9.5)]);

    expect(new RangeIndexer(store).rowsInRange(0, 10)).toEqual([0, 2]);
  });

  it('computes the time span of a selection', () => {
    const store = new FrameStore();
    store.appendBatch([span(1, 2), span(5, 11), span(9, 9.5)]);
    const ranges = new RangeIndexer(store);

    expect(ranges.selectionSpan([2, 0])).toEqual({ start: 1, end: 9.5 });
    expect(ranges.selectionSpan([1, 99])).toEqual({ start: 5, end: 11 });
    expect(ranges.selectionSpan([])).toBeNull();
    expect(ranges.selectionSpan([42])).toBeNull();
  });

  it('pairs poll and listen rows', () => {
    const store = new FrameStore();
    store.appendBatch([
      ...anticollision(0),
      nfcFrame({ type: 'Poll', data: [0x50, 0x00, 0x57, 0xcd], timeStart: 0.01, timeEnd: 0.0101 }),
      nfcFrame({ type: 'CarrierOff', tech: 'None', timeStart: 0.02, timeEnd: 0.02 }),
      nfcFrame({ type: 'Listen', data: [0x44, 0x00], timeStart: 0.03, timeEnd: 0.0301 }),
    ]);
    const ranges = new RangeIndexer(store);

    expect(ranges.exchangeAt(0)).toEqual({ poll: 0, listen: 1 });
    expect(ranges.exchangeAt(1)).toEqual({ poll: 0, listen: 1 });
    expect(ranges.exchangeAt(3)).toEqual({ poll: 2, listen: 3 });
    expect(ranges.exchangeAt(4)).toEqual({ poll: 4, listen: null });
    expect(ranges.exchangeAt(5)).toBeNull();
    expect(ranges.exchangeAt(6)).toBeNull();
    expect(ranges.exchangeAt(7)).toBeNull();
  });
});
