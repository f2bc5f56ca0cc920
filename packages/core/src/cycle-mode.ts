/**
 * @module cycle-mode
 * Folding of the base angular fraction through a {@link CycleMode}.
 *
 * The base fraction `f` runs from 0 along the drag direction once around the
 * circle back to 1. `f = 0` and `f -> 1` are the same angle (the seam).
 *
 * @packageDocumentation
 */

import { CycleMode } from '@conic-fill/types';

const TWO_PI = Math.PI * 2;

/** Display labels, in the order a cycle picker lists them. */
export const CYCLE_MODE_LABELS: Readonly<Record<CycleMode, string>> = {
  [CycleMode.Clamp]: 'No Cycle',
  [CycleMode.Reflect]: 'Reflect',
  [CycleMode.Repeat]: 'Repeat',
};

function unknownCycleMode(mode: never): never {
  throw new Error(`Unknown cycle mode: ${String(mode)}`);
}

/**
 * Convert an angle relative to the draw angle into the base fraction in [0, 1).
 *
 * @param relativeAngle - Angle in radians, expected in (-2PI, 2PI).
 */
export function baseFraction(relativeAngle: number): number {
  let f = (relativeAngle / TWO_PI + 1) % 1;
  if (f < 0) f += 1;
  // 1 and 0 are the same position on the circle
  if (f >= 1) f = 0;
  return f;
}

/**
 * Fold a base fraction through the cycle mode.
 *
 * @param f - Base fraction in [0, 1).
 * @param mode - Cycle mode. Values outside the enum throw.
 * @returns Interpolation fraction in [0, 1].
 */
export function foldCycle(f: number, mode: CycleMode): number {
  switch (mode) {
    case CycleMode.Clamp:
      return f;
    case CycleMode.Reflect:
      return f < 0.5 ? 2 * f : 2 * (1 - f);
    case CycleMode.Repeat:
      return f < 0.5 ? 2 * f : 2 * (f - 0.5);
    default:
      return unknownCycleMode(mode);
  }
}

/**
 * Whether the mode produces a hard color edge somewhere on the circle.
 * Only those modes need edge anti-aliasing.
 */
export function hasHardSeam(mode: CycleMode): boolean {
  switch (mode) {
    case CycleMode.Clamp:
    case CycleMode.Repeat:
      return true;
    case CycleMode.Reflect:
      return false;
    default:
      return unknownCycleMode(mode);
  }
}

/** Check that a value read from outside the type system is a cycle mode. */
export function isCycleMode(value: unknown): value is CycleMode {
  return value === CycleMode.Clamp || value === CycleMode.Reflect || value === CycleMode.Repeat;
}

/**
 * Parse a cycle mode from its display label (`No Cycle`, `Reflect`, `Repeat`)
 * or its enum value.
 *
 * @throws Error when the input names no cycle mode.
 */
export function parseCycleMode(input: string): CycleMode {
  if (isCycleMode(input)) return input;
  for (const mode of Object.values(CycleMode)) {
    if (CYCLE_MODE_LABELS[mode] === input) return mode;
  }
  throw new Error(`Unknown cycle mode: "${input}"`);
}

export function cycleModeLabel(mode: CycleMode): string {
  if (!isCycleMode(mode)) return unknownCycleMode(mode);
  return CYCLE_MODE_LABELS[mode];
}
