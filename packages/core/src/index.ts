/**
 * @conic-fill/core
 *
 * Angle gradient engine: drag geometry, cycle folding, supersampled
 * rendering into gray or RGBA rasters.
 *
 * @packageDocumentation
 */

// Drag geometry
export { DragGeometry } from './drag-geometry';

// Cycle modes
export {
  CYCLE_MODE_LABELS,
  baseFraction,
  foldCycle,
  hasHardSeam,
  isCycleMode,
  parseCycleMode,
  cycleModeLabel,
} from './cycle-mode';

// Channel blending
export {
  createRgbaBlend,
  createGrayBlend,
  createChannelBlend,
  layoutForChannelCount,
  channelCountForLayout,
} from './channel-blend';
export type { ChannelBlend } from './channel-blend';

// Sampler
export {
  AngleGradientSampler,
  DEFAULT_ANGLE_GRADIENT_OPTIONS,
  resolveAngleGradientOptions,
} from './angle-gradient';
export type {
  AaAccumulation,
  AngleGradientOptions,
  AngleGradientSamplerInit,
  FractionSample,
} from './angle-gradient';

// Fills
export {
  createRasterBuffer,
  planRowBands,
  blitRaster,
  renderAngleGradient,
  fillAngleGradient,
} from './fill';
export type { FillOptions } from './fill';

// Endpoint colors
export { normalizeColor, resolveEndpointColors, gradientTransparency } from './gradient-colors';
export type { GradientColorPreset, ColorPalette, GradientTransparency } from './gradient-colors';

