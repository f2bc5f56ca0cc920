/**
 * @module fill
 * Filling raster surfaces with an angle gradient.
 *
 * A fill renders the surface in horizontal bands. Bands never overlap, so
 * each one can be produced independently; an aborted fill leaves the bands
 * already written and holds nothing that needs releasing.
 *
 * @packageDocumentation
 */

import type {
  AngleGradientDef,
  ChannelCount,
  ChannelLayout,
  Raster,
  RasterBuffer,
  Rect,
} from '@conic-fill/types';
import type { AngleGradientOptions } from './angle-gradient';
import { AngleGradientSampler } from './angle-gradient';
import { channelCountForLayout, layoutForChannelCount } from './channel-blend';
import { DragGeometry } from './drag-geometry';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Options for {@link fillAngleGradient}. */
export interface FillOptions extends AngleGradientOptions {
  /** Rows per band. Default 64. */
  bandHeight?: number;
  /** Checked before each band; an aborted signal stops the fill by throwing its reason. */
  signal?: AbortSignal;
}

const DEFAULT_BAND_HEIGHT = 64;

// ---------------------------------------------------------------------------
// Buffers
// ---------------------------------------------------------------------------

/**
 * Allocate a surface.
 *
 * @param fill - Initial value of every byte. Default 0.
 */
export function createRasterBuffer(
  width: number,
  height: number,
  channels: ChannelCount,
  fill = 0,
): RasterBuffer {
  const w = Math.max(0, Math.floor(width));
  const h = Math.max(0, Math.floor(height));
  const data = new Uint8ClampedArray(w * h * channels);
  if (fill !== 0) data.fill(fill);
  return { width: w, height: h, channels, data };
}

/**
 * Split a rectangle into horizontal bands of at most `bandHeight` rows.
 * The bands cover the rectangle exactly once.
 */
export function planRowBands(rect: Rect, bandHeight: number): Rect[] {
  if (!Number.isInteger(bandHeight) || bandHeight < 1) {
    throw new RangeError(`bandHeight must be an integer >= 1, got ${bandHeight}`);
  }
  const bands: Rect[] = [];
  if (rect.width <= 0 || rect.height <= 0) return bands;

  for (let y = rect.y; y < rect.y + rect.height; y += bandHeight) {
    bands.push({
      x: rect.x,
      y,
      width: rect.width,
      height: Math.min(bandHeight, rect.y + rect.height - y),
    });
  }
  return bands;
}

/**
 * Copy a raster into a surface at the raster's origin, clipped to the surface.
 *
 * @throws Error if the channel counts differ.
 */
export function blitRaster(surface: RasterBuffer, raster: Raster): RasterBuffer {
  if (surface.channels !== raster.channels) {
    throw new Error(
      `Channel count mismatch: surface has ${surface.channels}, raster has ${raster.channels}`,
    );
  }
  const { channels } = surface;
  const x0 = Math.max(0, raster.x);
  const x1 = Math.min(surface.width, raster.x + raster.width);
  if (x1 <= x0) return surface;

  for (let j = 0; j < raster.height; j++) {
    const y = raster.y + j;
    if (y < 0 || y >= surface.height) continue;
    const src = (j * raster.width + (x0 - raster.x)) * channels;
    const dst = (y * surface.width + x0) * channels;
    surface.data.set(raster.data.subarray(src, src + (x1 - x0) * channels), dst);
  }
  return surface;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function dragOf(def: AngleGradientDef): DragGeometry {
  return new DragGeometry(def.start, def.end);
}

/**
 * Render one window of an angle gradient.
 *
 * A zero-length drag defines no gradient: the result is a zero-filled raster
 * of the window's size.
 */
export function renderAngleGradient(
  def: AngleGradientDef,
  rect: Rect,
  layout: ChannelLayout = 'rgba',
  options?: AngleGradientOptions,
): Raster {
  const drag = dragOf(def);
  if (drag.isDegenerate()) {
    const channels = channelCountForLayout(layout);
    const width = Math.max(0, rect.width);
    const height = Math.max(0, rect.height);
    return {
      x: rect.x,
      y: rect.y,
      width,
      height,
      channels,
      data: new Uint8ClampedArray(width * height * channels),
    };
  }

  const sampler = new AngleGradientSampler(
    { drag, startColor: def.startColor, endColor: def.endColor, cycleMode: def.cycleMode, layout },
    options,
  );
  return sampler.getRaster(rect.x, rect.y, rect.width, rect.height);
}

/**
 * Fill a whole surface with an angle gradient, in place.
 *
 * One-channel surfaces take the gray path, others RGBA. A zero-length drag
 * leaves the surface untouched.
 *
 * @returns The same surface.
 */
export function fillAngleGradient(
  surface: RasterBuffer,
  def: AngleGradientDef,
  options: FillOptions = {},
): RasterBuffer {
  const drag = dragOf(def);
  if (drag.isClick()) return surface;

  const { bandHeight = DEFAULT_BAND_HEIGHT, signal, ...samplerOptions } = options;
  const sampler = new AngleGradientSampler(
    {
      drag,
      startColor: def.startColor,
      endColor: def.endColor,
      cycleMode: def.cycleMode,
      layout: layoutForChannelCount(surface.channels),
    },
    samplerOptions,
  );

  const bands = planRowBands({ x: 0, y: 0, width: surface.width, height: surface.height }, bandHeight);
  for (const band of bands) {
    signal?.throwIfAborted();
    blitRaster(surface, sampler.getRaster(band.x, band.y, band.width, band.height));
  }
  return surface;
}
