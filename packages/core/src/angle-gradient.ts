/**
 * @module angle-gradient
 * Angle (conical) gradient sampler.
 *
 * Each pixel's color depends on the angle between the drag direction and the
 * vector from the drag start to the pixel. The angle becomes a base fraction
 * in [0, 1), which the cycle mode folds into the interpolation fraction t.
 *
 * Clamp and Repeat leave hard color edges (seams) on the circle. Pixels close
 * to a seam are supersampled on a regular sub-pixel grid. The seam band is
 * `aaThreshold / distance` wide in t, so it narrows in angle away from the
 * center, where the seam itself gets angularly thinner.
 *
 * Sampling is pure: rows or tiles can be rendered independently.
 *
 * @packageDocumentation
 */

import type { ChannelLayout, Color, CycleMode, Raster } from '@conic-fill/types';
import type { ChannelBlend } from './channel-blend';
import { channelCountForLayout, createChannelBlend } from './channel-blend';
import { baseFraction, foldCycle, hasHardSeam } from './cycle-mode';
import type { DragGeometry } from './drag-geometry';
import { normalizeColor } from './gradient-colors';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * How supersampled values are averaged.
 * - `float`: average the sub-sample fractions, then blend and truncate once
 * - `integer`: blend and truncate every sub-sample, then integer-divide the sum
 *   (bit-compatible with renders made that way)
 */
export type AaAccumulation = 'float' | 'integer';

/** Tuning for the angle gradient sampler. */
export interface AngleGradientOptions {
  /** Numerator of the seam band width `aaThreshold / distance`. Default 0.2. */
  aaThreshold?: number;
  /** Sub-samples per axis when anti-aliasing. Default 4. */
  aaGridSize?: number;
  /** Default `float`. */
  aaAccumulation?: AaAccumulation;
  /** Log render timing with console.debug. */
  debug?: boolean;
}

export const DEFAULT_ANGLE_GRADIENT_OPTIONS: Readonly<Required<AngleGradientOptions>> = {
  aaThreshold: 0.2,
  aaGridSize: 4,
  aaAccumulation: 'float',
  debug: false,
};

/**
 * Merge options over the defaults and validate them.
 *
 * @throws RangeError on a negative or non-finite threshold or a grid size that is not a positive integer.
 */
export function resolveAngleGradientOptions(
  options: AngleGradientOptions = {},
): Required<AngleGradientOptions> {
  const resolved = { ...DEFAULT_ANGLE_GRADIENT_OPTIONS };
  if (options.aaThreshold !== undefined) resolved.aaThreshold = options.aaThreshold;
  if (options.aaGridSize !== undefined) resolved.aaGridSize = options.aaGridSize;
  if (options.aaAccumulation !== undefined) resolved.aaAccumulation = options.aaAccumulation;
  if (options.debug !== undefined) resolved.debug = options.debug;

  if (!Number.isFinite(resolved.aaThreshold) || resolved.aaThreshold < 0) {
    throw new RangeError(`aaThreshold must be a finite number >= 0, got ${resolved.aaThreshold}`);
  }
  if (!Number.isInteger(resolved.aaGridSize) || resolved.aaGridSize < 1) {
    throw new RangeError(`aaGridSize must be an integer >= 1, got ${resolved.aaGridSize}`);
  }
  if (resolved.aaAccumulation !== 'float' && resolved.aaAccumulation !== 'integer') {
    throw new RangeError(`Unknown aaAccumulation: ${String(resolved.aaAccumulation)}`);
  }
  return resolved;
}

// ---------------------------------------------------------------------------
// Sampler
// ---------------------------------------------------------------------------

/** Inputs of one angle gradient fill. */
export interface AngleGradientSamplerInit {
  drag: DragGeometry;
  startColor: Color;
  endColor: Color;
  cycleMode: CycleMode;
  layout: ChannelLayout;
}

/** Interpolation fraction of one pixel and whether it was supersampled. */
export interface FractionSample {
  t: number;
  antialiased: boolean;
}

function emptyRaster(x: number, y: number, channels: 1 | 4): Raster {
  return { x, y, width: 0, height: 0, channels, data: new Uint8ClampedArray(0) };
}

/**
 * Samples an angle gradient for one drag, color pair, cycle mode and layout.
 * Immutable once constructed.
 */
export class AngleGradientSampler {
  readonly drag: DragGeometry;
  readonly cycleMode: CycleMode;
  readonly layout: ChannelLayout;
  readonly channels: 1 | 4;
  readonly options: Readonly<Required<AngleGradientOptions>>;

  private readonly blend: ChannelBlend;
  private readonly drawAngle: number;
  private readonly seamed: boolean;
  /** Sub-pixel offsets along one axis: `n / grid - 0.5`. */
  private readonly subOffsets: Float64Array;
  private readonly subSampleCount: number;

  /**
   * @throws Error if the drag is degenerate. Check `drag.isDegenerate()` first.
   * @throws Error if the cycle mode is unknown.
   */
  constructor(init: AngleGradientSamplerInit, options?: AngleGradientOptions) {
    if (init.drag.isDegenerate()) {
      throw new Error('Cannot sample an angle gradient from a zero-length drag');
    }
    this.drag = init.drag;
    this.cycleMode = init.cycleMode;
    this.layout = init.layout;
    this.channels = channelCountForLayout(init.layout);
    this.options = resolveAngleGradientOptions(options);

    this.blend = createChannelBlend(
      init.layout,
      normalizeColor(init.startColor),
      normalizeColor(init.endColor),
    );
    this.drawAngle = init.drag.drawAngle();
    this.seamed = hasHardSeam(init.cycleMode);

    const grid = this.options.aaGridSize;
    this.subOffsets = new Float64Array(grid);
    for (let n = 0; n < grid; n++) {
      this.subOffsets[n] = n / grid - 0.5;
    }
    this.subSampleCount = grid * grid;
  }

  /** Folded interpolation fraction at a (possibly sub-pixel) point. */
  interpolate(x: number, y: number): number {
    const relativeAngle = this.drag.angleFromStartTo(x, y) - this.drawAngle;
    return foldCycle(baseFraction(relativeAngle), this.cycleMode);
  }

  /** Whether pixel (x, y) with fraction t lies in a seam band. */
  needsAntialiasing(x: number, y: number, t: number): boolean {
    if (!this.seamed) return false;
    const threshold = this.options.aaThreshold / this.drag.taxiCabMetric(x, y);
    return t > 1 - threshold || t < threshold;
  }

  /**
   * Fraction used to blend pixel (x, y). Inside a seam band it is the mean of
   * the sub-sample fractions.
   */
  sampleFraction(x: number, y: number): FractionSample {
    const t = this.interpolate(x, y);
    if (!this.needsAntialiasing(x, y, t)) {
      return { t, antialiased: false };
    }
    return { t: this.meanSubSampleFraction(x, y), antialiased: true };
  }

  /** {@link sampleFraction} without the wrapper object. */
  private fraction(x: number, y: number): number {
    const t = this.interpolate(x, y);
    return this.needsAntialiasing(x, y, t) ? this.meanSubSampleFraction(x, y) : t;
  }

  private meanSubSampleFraction(x: number, y: number): number {
    let sum = 0;
    for (const dy of this.subOffsets) {
      for (const dx of this.subOffsets) {
        sum += this.interpolate(x + dx, y + dy);
      }
    }
    return sum / this.subSampleCount;
  }

  /** Write the channels of pixel (x, y) into `out` starting at `offset`. */
  writePixel(x: number, y: number, out: Uint8ClampedArray, offset: number): void {
    const { blend, channels } = this;

    if (this.options.aaAccumulation === 'integer') {
      const t = this.interpolate(x, y);
      if (this.needsAntialiasing(x, y, t)) {
        this.writeIntegerAverage(x, y, out, offset);
        return;
      }
      for (let c = 0; c < channels; c++) {
        out[offset + c] = Math.trunc(blend.channelAt(c, t));
      }
      return;
    }

    const t = this.fraction(x, y);
    for (let c = 0; c < channels; c++) {
      out[offset + c] = Math.trunc(blend.channelAt(c, t));
    }
  }

  private writeIntegerAverage(x: number, y: number, out: Uint8ClampedArray, offset: number): void {
    const { blend, channels } = this;
    const sums: number[] = new Array<number>(channels).fill(0);
    for (const dy of this.subOffsets) {
      for (const dx of this.subOffsets) {
        const t = this.interpolate(x + dx, y + dy);
        for (let c = 0; c < channels; c++) {
          sums[c] += Math.trunc(blend.channelAt(c, t));
        }
      }
    }
    for (let c = 0; c < channels; c++) {
      out[offset + c] = Math.trunc(sums[c] / this.subSampleCount);
    }
  }

  /**
   * Render the window starting at (startX, startY).
   *
   * @returns A row-major raster of `width * height * channels` bytes. A
   *   non-positive width or height gives an empty raster.
   */
  getRaster(startX: number, startY: number, width: number, height: number): Raster {
    if (width <= 0 || height <= 0) {
      return emptyRaster(startX, startY, this.channels);
    }

    const measurePerf = this.options.debug;
    if (measurePerf) performance.mark('angle-gradient-start');

    const { channels } = this;
    const data = new Uint8ClampedArray(width * height * channels);
    for (let j = 0; j < height; j++) {
      const y = startY + j;
      for (let i = 0; i < width; i++) {
        this.writePixel(startX + i, y, data, (j * width + i) * channels);
      }
    }

    if (measurePerf) {
      performance.mark('angle-gradient-end');
      const measure = performance.measure(
        'AngleGradientSampler.getRaster',
        'angle-gradient-start',
        'angle-gradient-end',
      );
      // eslint-disable-next-line no-console
      console.debug(
        `[angle-gradient] ${measure.duration.toFixed(2)}ms (${width}x${height}, ${this.layout}, ${this.cycleMode}, drag ${this.drag.length().toFixed(1)}px)`,
      );
    }

    return { x: startX, y: startY, width, height, channels, data };
  }
}
