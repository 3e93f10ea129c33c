import { describe, expect, it } from 'vitest';
import { RingWindow } from '../src/timeseries/ringWindow.js';

type Sample = { at: number; value: number };

function createWindow(capacity: number) {
  return new RingWindow<Sample>({ capacity, timestampOf: sample => sample.at });
}

describe('RingWindow', () => {
  it('keeps samples oldest first until capacity is reached', () => {
    const window = createWindow(3);
    window.push({ at: 1000, value: 1 });
    window.push({ at: 2000, value: 2 });

    expect(window.size).toBe(2);
    expect(window.isFull()).toBe(false);
    expect(window.toArray().map(sample => sample.value)).toEqual([1, 2]);
    expect(window.first()?.value).toBe(1);
    expect(window.last()?.value).toBe(2);
  });

  it('overwrites the oldest sample once full', () => {
    const window = createWindow(3);
    for (let index = 1; index <= 5; index += 1) {
      window.push({ at: index * 1000, value: index });
    }

    expect(window.toArray().map(sample => sample.value)).toEqual([3, 4, 5]);
    expect(window.totalPushed).toBe(5);
    expect(window.totalEvicted).toBe(2);
    expect(window.isFull()).toBe(true);
    expect(window.first()?.value).toBe(3);
    expect(window.last()?.value).toBe(5);
    expect(window.latest(2).map(sample => sample.value)).toEqual([4, 5]);
    expect(window.latest(10).map(sample => sample.value)).toEqual([3, 4, 5]);
  });

  it('derives statistics from the current contents', () => {
    const window = createWindow(4);
    window.push({ at: 0, value: 4 });
    window.push({ at: 1000, value: 8 });
    window.push({ at: 2000, value: 6 });

    expect(window.stats(sample => sample.value)).toEqual({ count: 3, sum: 18, min: 4, max: 8, mean: 6 });
  });

  it('reports zeroed statistics when empty', () => {
    const window = createWindow(2);

    expect(window.stats(sample => sample.value)).toEqual({ count: 0, sum: 0, min: 0, max: 0, mean: 0 });
    expect(window.spanMs()).toBe(0);
    expect(window.ratePerSecond(sample => sample.value)).toBe(0);
    expect(window.frequency()).toBe(0);
    expect(window.first()).toBeNull();
    expect(window.last()).toBeNull();
  });

  it('computes growth per second across the window span', () => {
    const window = createWindow(10);
    window.push({ at: 0, value: 100 });
    window.push({ at: 5000, value: 350 });
    window.push({ at: 10_000, value: 600 });

    expect(window.spanMs()).toBe(10_000);
    expect(window.ratePerSecond(sample => sample.value)).toBe(50);
    expect(window.frequency()).toBe(0.2);
  });

  it('treats a single sample as spanning no time', () => {
    const window = createWindow(5);
    window.push({ at: 1234, value: 9 });

    expect(window.spanMs()).toBe(0);
    expect(window.ratePerSecond(sample => sample.value)).toBe(0);
  });

  it('clears samples and counters', () => {
    const window = createWindow(2);
    window.push({ at: 1, value: 1 });
    window.push({ at: 2, value: 2 });
    window.push({ at: 3, value: 3 });
    window.clear();

    expect(window.size).toBe(0);
    expect(window.totalPushed).toBe(0);
    expect(window.totalEvicted).toBe(0);
    expect(window.toArray()).toEqual([]);
  });
});
