import { describe, it, expect, vi, afterEach } from 'vitest';
import { vec2 } from '../../src/algebra/vector';
import { periodicClassicNoise1, periodicClassicNoise2 } from '../../src/noise/classic';
import { periodicSimplexNoise1 } from '../../src/noise/periodic-simplex';
import { warnOnce } from '../../src/utils/warn';

// Warnings are once per process, so the order of these tests matters.

afterEach(() => {
  vi.restoreAllMocks();
});

describe('warnOnce', () => {
  it('warns only the first time a key is seen', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    warnOnce('test-key', 'first');
    warnOnce('test-key', 'second');
    warnOnce('other-key', 'third');
    expect(warn.mock.calls).toEqual([['first'], ['third']]);
  });
});

describe('period range warnings', () => {
  it('stay silent for periods in range', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    periodicClassicNoise1(0.5, 256);
    periodicSimplexNoise1(0.5, 289);
    periodicClassicNoise2(vec2(0.5, 0.5), vec2(1, 16));
    expect(warn).not.toHaveBeenCalled();
  });

  it('warn once for the classic family', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(Number.isFinite(periodicClassicNoise1(0.5, 300))).toBe(true);
    periodicClassicNoise2(vec2(0.5, 0.5), vec2(4, 2.5));
    expect(warn.mock.calls).toEqual([['classic noise period 300 is outside 1..256; the pattern will alias']]);
  });

  it('warn separately for the simplex family', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    periodicSimplexNoise1(0.5, 0);
    periodicSimplexNoise1(0.5, 400);
    expect(warn.mock.calls).toEqual([['simplex noise period 0 is outside 1..289; the pattern will alias']]);
  });

  it('a non-positive period collapses the axis', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const period = vec2(0, 4);
    expect(periodicClassicNoise2(vec2(5.3, 0.6), period)).toBeCloseTo(periodicClassicNoise2(vec2(0.3, 0.6), period), 9);
  });
});
