/**
 * @conic-fill/types
 *
 * Shared type definitions for the angle gradient engine.
 * Apart from the `CycleMode` enum this package has no runtime code.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Color, Point, Rect } from './common';

// Rasters and channel layouts
export type { ChannelCount, ChannelLayout, Raster, RasterBuffer } from './raster';

// Gradient definition
export type { AngleGradientDef } from './gradient';
export { CycleMode } from './gradient';
