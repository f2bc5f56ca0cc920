/**
 * @module raster
 * Channel buffers produced by the gradient engine and the surfaces they are written into.
 */

/**
 * Channel layout of a fill target.
 * - `rgba`: four channels per pixel, stored R, G, B, A
 * - `gray`: one intensity channel per pixel
 */
export type ChannelLayout = 'rgba' | 'gray';

/** Number of channels per pixel. */
export type ChannelCount = 1 | 4;

/** A writable pixel surface. `data.length` is `width * height * channels`. */
export interface RasterBuffer {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  readonly data: Uint8ClampedArray;
}

/**
 * A rendered window of a fill, positioned at (x, y) in the caller's
 * coordinate space. Row-major.
 */
export interface Raster extends RasterBuffer {
  readonly x: number;
  readonly y: number;
}
