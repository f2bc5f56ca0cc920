/**
 * @module gradient-colors
 * Endpoint colors for a gradient fill: presets, inversion, normalization.
 *
 * @packageDocumentation
 */

import type { Color } from '@conic-fill/types';

/** Where the two endpoint colors come from. */
export type GradientColorPreset = 'foreground-background' | 'foreground-transparent' | 'black-white';

/** The user's current foreground and background colors. */
export interface ColorPalette {
  foreground: Color;
  background: Color;
}

/** Whether a gradient between two colors can produce see-through pixels. */
export type GradientTransparency = 'opaque' | 'translucent';

const BLACK: Color = { r: 0, g: 0, b: 0, a: 255 };
const WHITE: Color = { r: 255, g: 255, b: 255, a: 255 };

function normalizeChannel(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Color channel ${name} must be a finite number, got ${value}`);
  }
  const v = Math.round(value);
  return v < 0 ? 0 : v > 255 ? 255 : v;
}

/**
 * Round every channel to an integer and clamp it into [0, 255].
 *
 * @throws RangeError if a channel is NaN or infinite.
 */
export function normalizeColor(color: Color): Color {
  return {
    r: normalizeChannel('r', color.r),
    g: normalizeChannel('g', color.g),
    b: normalizeChannel('b', color.b),
    a: normalizeChannel('a', color.a),
  };
}

/**
 * Resolve the start and end colors of a preset.
 *
 * @param invert - Swap start and end.
 * @returns `[start, end]`, normalized.
 */
export function resolveEndpointColors(
  preset: GradientColorPreset,
  palette: ColorPalette,
  invert = false,
): [Color, Color] {
  let start: Color;
  let end: Color;
  switch (preset) {
    case 'foreground-background':
      start = palette.foreground;
      end = palette.background;
      break;
    case 'foreground-transparent':
      start = palette.foreground;
      end = { ...palette.foreground, a: 0 };
      break;
    case 'black-white':
      start = BLACK;
      end = WHITE;
      break;
    default: {
      const unknown: never = preset;
      throw new Error(`Unknown gradient color preset: ${String(unknown)}`);
    }
  }

  const pair: [Color, Color] = [normalizeColor(start), normalizeColor(end)];
  return invert ? [pair[1], pair[0]] : pair;
}

export function gradientTransparency(start: Color, end: Color): GradientTransparency {
  return start.a === 255 && end.a === 255 ? 'opaque' : 'translucent';
}
