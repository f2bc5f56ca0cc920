import { describe, it, expect } from 'vitest';
import type { Color } from '@conic-fill/types';
import { gradientTransparency, normalizeColor, resolveEndpointColors } from './gradient-colors';

const palette = {
  foreground: { r: 200, g: 30, b: 40, a: 255 },
  background: { r: 10, g: 20, b: 250, a: 255 },
};

describe('normalizeColor', () => {
  it('rounds and clamps channels into [0, 255]', () => {
    expect(normalizeColor({ r: -5, g: 300.4, b: 12.6, a: 255 })).toEqual({ r: 0, g: 255, b: 13, a: 255 });
  });

  it('rejects non-finite channels', () => {
    expect(() => normalizeColor({ r: Number.NaN, g: 0, b: 0, a: 255 })).toThrow(RangeError);
    expect(() => normalizeColor({ r: 0, g: 0, b: 0, a: Number.POSITIVE_INFINITY })).toThrow(
      'Color channel a must be a finite number',
    );
  });
});

describe('resolveEndpointColors', () => {
  it('goes from foreground to background', () => {
    expect(resolveEndpointColors('foreground-background', palette)).toEqual([
      palette.foreground,
      palette.background,
    ]);
  });

  it('fades the foreground to transparent', () => {
    const [start, end] = resolveEndpointColors('foreground-transparent', palette);
    expect(start).toEqual(palette.foreground);
    expect(end).toEqual({ r: 200, g: 30, b: 40, a: 0 });
  });

  it('ignores the palette for black-white', () => {
    expect(resolveEndpointColors('black-white', palette)).toEqual([
      { r: 0, g: 0, b: 0, a: 255 },
      { r: 255, g: 255, b: 255, a: 255 },
    ]);
  });

  it('swaps start and end when inverted', () => {
    const [start, end] = resolveEndpointColors('black-white', palette, true);
    expect(start).toEqual({ r: 255, g: 255, b: 255, a: 255 });
    expect(end).toEqual({ r: 0, g: 0, b: 0, a: 255 });
  });

  it('normalizes palette colors', () => {
    const loose: Color = { r: 300, g: -1, b: 0.4, a: 255 };
    const [start] = resolveEndpointColors('foreground-background', { ...palette, foreground: loose });
    expect(start).toEqual({ r: 255, g: 0, b: 0, a: 255 });
  });
});

describe('gradientTransparency', () => {
  it('is opaque only when both ends are opaque', () => {
    expect(gradientTransparency(palette.foreground, palette.background)).toBe('opaque');
    const [start, end] = resolveEndpointColors('foreground-transparent', palette);
    expect(gradientTransparency(start, end)).toBe('translucent');
  });
});
