/**
 * @module common
 * Common primitive types used across all packages.
 */

/** RGBA color with 8-bit integer channels (0-255), alpha included. */
export interface Color {
  /** Red channel (0-255) */
  r: number;
  /** Green channel (0-255) */
  g: number;
  /** Blue channel (0-255) */
  b: number;
  /** Alpha channel (0-255) */
  a: number;
}

/** 2D point in raster space. */
export interface Point {
  /** X coordinate */
  x: number;
  /** Y coordinate */
  y: number;
}

/** Axis-aligned rectangle. */
export interface Rect {
  /** Left edge X coordinate */
  x: number;
  /** Top edge Y coordinate */
  y: number;
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}
