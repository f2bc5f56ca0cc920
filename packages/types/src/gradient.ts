/**
 * @module gradient
 * Angle gradient definition types.
 */

import type { Color, Point } from './common';

/**
 * How the gradient repeats around the full circle.
 * - Clamp: one pass from start to end color, hard seam along the drag direction
 * - Reflect: start → end → start, no hard seam
 * - Repeat: two passes, hard seams along and opposite the drag direction
 */
export enum CycleMode {
  Clamp = 'clamp',
  Reflect = 'reflect',
  Repeat = 'repeat',
}

/** Everything needed to render one angle gradient fill. */
export interface AngleGradientDef {
  /** Drag start: the gradient's center. */
  start: Point;
  /** Drag end: sets the direction where the start color begins. */
  end: Point;
  startColor: Color;
  endColor: Color;
  cycleMode: CycleMode;
}
