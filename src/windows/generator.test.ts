import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  WindowValidationError,
  countWindows,
  generateWindows,
  windowLabel,
  windowListName,
} from './generator.js';

describe('generateWindows', () => {
  it('should produce a single window when the step overshoots', () => {
    expect([...generateWindows(120, 100, 25)]).toEqual([{ start: 0, end: 100 }]);
  });

  it('should produce overlapping windows', () => {
    expect([...generateWindows(10, 4, 3)]).toEqual([
      { start: 0, end: 4 },
      { start: 3, end: 7 },
      { start: 6, end: 10 },
    ]);
  });

  it('should include a window that ends exactly at N', () => {
    expect([...generateWindows(125, 100, 25)]).toEqual([
      { start: 0, end: 100 },
      { start: 25, end: 125 },
    ]);
  });

  it('should produce one window when N equals W', () => {
    expect([...generateWindows(5, 5, 1)]).toEqual([{ start: 0, end: 5 }]);
  });

  it('should restart on each iteration', () => {
    const windows = generateWindows(8, 4, 2);

    expect([...windows]).toEqual([...windows]);
    expect([...windows]).toHaveLength(3);
  });

  it('should reject N < W before iteration', () => {
    expect(() => generateWindows(99, 100, 25)).toThrow(WindowValidationError);

    try {
      generateWindows(99, 100, 25);
    } catch (error) {
      expect(error instanceof WindowValidationError && error.code).toBe('insufficient_genes');
    }
  });

  it('should reject non-positive or fractional sizes', () => {
    expect(() => generateWindows(10, 0, 1)).toThrow('Window size must be a positive integer');
    expect(() => generateWindows(10, 2, 0)).toThrow('Step size must be a positive integer');
    expect(() => generateWindows(10, 2, 1.5)).toThrow('Step size must be a positive integer');
  });

  describe('properties', () => {
    const sizes = fc
      .tuple(
        fc.integer({ min: 1, max: 300 }),
        fc.integer({ min: 0, max: 1000 }),
        fc.integer({ min: 1, max: 60 })
      )
      .map(([w, extra, s]) => ({ n: w + extra, w, s }));

    it('should yield floor((N - W) / S) + 1 windows', () => {
      fc.assert(
        fc.property(sizes, ({ n, w, s }) => {
          const windows = [...generateWindows(n, w, s)];
          expect(windows).toHaveLength(Math.floor((n - w) / s) + 1);
          expect(countWindows(n, w, s)).toBe(windows.length);
        })
      );
    });

    it('should start at [0, W) with starts S apart, all within N', () => {
      fc.assert(
        fc.property(sizes, ({ n, w, s }) => {
          const windows = [...generateWindows(n, w, s)];
          expect(windows[0]).toEqual({ start: 0, end: w });
          windows.forEach((win, i) => {
            expect(win.start).toBe(i * s);
            expect(win.end - win.start).toBe(w);
            expect(win.end).toBeLessThanOrEqual(n);
          });
        })
      );
    });

    it('should always reject N < W', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 500 }),
          fc.integer({ min: 1, max: 500 }),
          fc.integer({ min: 1, max: 50 }),
          (w, deficit, s) => {
            expect(() => generateWindows(Math.max(0, w - deficit), w, s)).toThrow(
              WindowValidationError
            );
          }
        )
      );
    });
  });
});

describe('window naming', () => {
  it('should label with both bounds plus one', () => {
    expect(windowLabel({ start: 0, end: 100 })).toBe('1-101');
    expect(windowLabel({ start: 25, end: 125 })).toBe('26-126');
  });

  it('should build the list name used for files and submissions', () => {
    expect(windowListName({ start: 0, end: 100 })).toBe('1to101');
  });
});
