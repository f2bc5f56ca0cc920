/**
 * @module drag-geometry
 * Start/end points of a gradient drag and the measurements derived from them.
 *
 * @packageDocumentation
 */

import type { Point } from '@conic-fill/types';

/** Start and end closer than this on both axes count as a click. */
const DEGENERATE_EPSILON = 1e-9;

/**
 * An immutable drag from `start` to `end` in raster coordinates.
 *
 * The draw angle is computed once, at construction.
 */
export class DragGeometry {
  readonly start: Readonly<Point>;
  readonly end: Readonly<Point>;
  private readonly angle: number;

  constructor(start: Point, end: Point) {
    this.start = { x: start.x, y: start.y };
    this.end = { x: end.x, y: end.y };
    this.angle = Math.atan2(end.y - start.y, end.x - start.x);
  }

  static fromCoords(x0: number, y0: number, x1: number, y1: number): DragGeometry {
    return new DragGeometry({ x: x0, y: y0 }, { x: x1, y: y1 });
  }

  /** Angle of the start → end vector, in radians. */
  drawAngle(): number {
    return this.angle;
  }

  /** Angle of the vector from the start point to (x, y), in (-PI, PI]. */
  angleFromStartTo(x: number, y: number): number {
    return Math.atan2(y - this.start.y, x - this.start.x);
  }

  /**
   * Manhattan distance from the start point to (x, y), never below 1.
   * Used as a divisor when sizing the anti-aliasing band.
   */
  taxiCabMetric(x: number, y: number): number {
    return Math.max(1, Math.abs(x - this.start.x) + Math.abs(y - this.start.y));
  }

  /** True when the drag has zero length. Such a drag defines no gradient. */
  isDegenerate(): boolean {
    return (
      Math.abs(this.end.x - this.start.x) < DEGENERATE_EPSILON &&
      Math.abs(this.end.y - this.start.y) < DEGENERATE_EPSILON
    );
  }

  /** Alias of {@link isDegenerate}: the user clicked instead of dragging. */
  isClick(): boolean {
    return this.isDegenerate();
  }

  length(): number {
    return Math.hypot(this.end.x - this.start.x, this.end.y - this.start.y);
  }
}
