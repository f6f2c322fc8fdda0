import type { Vector } from 'vecti';
import type { ColorName, Difficulty, LayoutVariant, Rgb, ShapeKind, ShapeSpec, Side, TaskData } from './types';
import type { Rng } from './random';
import { choices, randInt, sample } from './random';
import { chooseLayout, columnsFor, generatePositions, jitterFor } from './layout';
import { COLORS, REGIONS, SHAPES, UNIQUE_ATTEMPTS } from './constants';
import { assertNever } from './utils';

export interface CanvasSize {
  width: number;
  height: number;
}

/**
 * Without replacement while the palette lasts; beyond that, one full
 * permutation followed by independent draws for the remainder.
 */
function samplePalette<T>(rng: Rng, palette: readonly T[], count: number): T[] {
  if (count <= palette.length) return sample(rng, palette, count);
  return [
    ...sample(rng, palette, palette.length),
    ...choices(rng, palette, count - palette.length),
  ];
}

export function sampleShapes(rng: Rng, count: number): ShapeKind[] {
  return samplePalette(rng, SHAPES, count);
}

export function sampleColors(rng: Rng, count: number): { name: ColorName; rgb: Rgb }[] {
  return samplePalette(rng, COLORS, count);
}

export function shapeCountForDifficulty(rng: Rng, difficulty: Difficulty): number {
  switch (difficulty) {
    case 'easy': return randInt(rng, 2, 3);
    case 'medium': return randInt(rng, 3, 5);
    case 'hard': return randInt(rng, 5, 6);
    default: return assertNever(difficulty);
  }
}

type SignatureItem = [ShapeKind, ColorName, number, number, number, number, number];

const round1 = (n: number) => Math.round(n * 10) / 10;

function compareItems(a: SignatureItem, b: SignatureItem): number {
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (x === y) continue;
    if (typeof x === 'number' && typeof y === 'number') return x - y;
    return String(x) < String(y) ? -1 : 1;
  }
  return 0;
}

/** Canonical, order-independent encoding of a puzzle, positions to 0.1px. */
export function buildSignature(specs: readonly ShapeSpec[], layoutVariant: LayoutVariant): string {
  const items: SignatureItem[] = specs.map(s => [
    s.shape,
    s.colorName,
    round1(s.start.x),
    round1(s.start.y),
    round1(s.target.x),
    round1(s.target.y),
    round1(s.size),
  ]);
  items.sort(compareItems);
  return `${layoutVariant}|${specs.length}|` + items.map(item => item.join(',')).join('|');
}

/**
 * Builds shape specs for one canvas and keeps the signatures it has handed
 * out, so repeated calls avoid repeating a puzzle.
 */
export class TaskAssembler {
  private readonly canvas: CanvasSize;
  private readonly rng: Rng;
  private readonly seen = new Set<string>();

  constructor(canvas: CanvasSize, rng: Rng) {
    this.canvas = canvas;
    this.rng = rng;
  }

  get seenSignatures(): ReadonlySet<string> {
    return this.seen;
  }

  private positionsFor(side: Side, layout: LayoutVariant, count: number): { positions: Vector[]; size: number } {
    const { width, height } = this.canvas;
    const region = REGIONS[side];
    return generatePositions(this.rng, {
      count,
      columns: columnsFor(layout, side),
      xRange: [region.x[0] * width, region.x[1] * width],
      yRange: [region.y[0] * height, region.y[1] * height],
      jitter: jitterFor(layout, side),
    });
  }

  /** Card i always pairs with slot i; nothing reorders the two lists. */
  createSpecs(count: number): { specs: ShapeSpec[]; layoutVariant: LayoutVariant } {
    const layoutVariant = chooseLayout(count);
    const cards = this.positionsFor('cards', layoutVariant, count);
    const slots = this.positionsFor('slots', layoutVariant, count);
    const size = Math.min(cards.size, slots.size);
    const shapes = sampleShapes(this.rng, count);
    const colors = sampleColors(this.rng, count);

    const specs: ShapeSpec[] = [];
    for (let i = 0; i < count; i++) {
      specs.push({
        shape: shapes[i],
        colorName: colors[i].name,
        colorRGB: colors[i].rgb,
        start: cards.positions[i],
        target: slots.positions[i],
        size,
      });
    }
    return { specs, layoutVariant };
  }

  /**
   * Up to UNIQUE_ATTEMPTS tries for an unseen signature. If every try
   * collides, one more generation is returned as-is and not recorded.
   */
  generateTaskData(difficulty: Difficulty): TaskData {
    const numShapes = shapeCountForDifficulty(this.rng, difficulty);

    for (let attempt = 0; attempt < UNIQUE_ATTEMPTS; attempt++) {
      const { specs, layoutVariant } = this.createSpecs(numShapes);
      const signature = buildSignature(specs, layoutVariant);
      if (!this.seen.has(signature)) {
        this.seen.add(signature);
        return { specs, layoutVariant, difficulty, numShapes };
      }
    }

    const { specs, layoutVariant } = this.createSpecs(numShapes);
    return { specs, layoutVariant, difficulty, numShapes };
  }
}
