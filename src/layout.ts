import { Vector } from 'vecti';
import type { LayoutVariant, Side } from './types';
import type { Rng } from './random';
import { uniform } from './random';
import { assertNever } from './utils';
import { CELL_FILL, MAX_SHAPE_SIZE } from './constants';

export type Range = readonly [min: number, max: number];

export function chooseLayout(count: number): LayoutVariant {
  if (count <= 2) return 'line';
  if (count === 3) return 'staggered';
  if (count === 4) return 'grid';
  return 'scatter';
}

export function columnsFor(layout: LayoutVariant, side: Side): number {
  switch (layout) {
    case 'line': return 1;
    case 'staggered': return side === 'cards' ? 2 : 1;
    case 'grid': return 2;
    case 'scatter': return 2;
    default: return assertNever(layout);
  }
}

/** Jitter as a fraction of the region's width/height. */
export function jitterFor(layout: LayoutVariant, side: Side): number {
  switch (layout) {
    case 'line': return 0;
    case 'staggered': return side === 'cards' ? 0.015 : 0;
    case 'grid': return 0.01;
    case 'scatter': return side === 'cards' ? 0.03 : 0.015;
    default: return assertNever(layout);
  }
}

export interface PositionRequest {
  count: number;
  columns: number;
  xRange: Range;
  yRange: Range;
  jitter?: number;
}

/**
 * Lay `count` items out row-major on a `columns`-wide grid, each centered in
 * its cell, optionally nudged by up to `jitter` of the range extent on each
 * axis. `size` is the largest shape that fits any cell.
 */
export function generatePositions(
  rng: Rng,
  { count, columns, xRange, yRange, jitter = 0 }: PositionRequest,
): { positions: Vector[]; size: number } {
  const cols = Math.max(1, columns);
  const rows = Math.max(1, Math.ceil(count / cols));
  const spanX = xRange[1] - xRange[0];
  const spanY = yRange[1] - yRange[0];
  const positions: Vector[] = [];

  for (let idx = 0; idx < count; idx++) {
    const row = Math.floor(idx / cols);
    const col = idx % cols;
    let x = xRange[0] + (col + 0.5) / cols * spanX;
    let y = yRange[0] + (row + 0.5) / rows * spanY;
    if (jitter > 0) {
      x += uniform(rng, -jitter, jitter) * spanX;
      y += uniform(rng, -jitter, jitter) * spanY;
    }
    positions.push(new Vector(x, y));
  }

  const cellW = spanX / cols;
  const cellH = spanY / rows;
  const size = Math.min(MAX_SHAPE_SIZE, cellW * CELL_FILL, cellH * CELL_FILL);
  return { positions, size };
}
