import { describe, it, expect } from 'vitest';
import { Vector } from 'vecti';
import { TaskAssembler, buildSignature, sampleColors, sampleShapes, shapeCountForDifficulty } from './assemble';
import { createRng } from './random';
import { COLORS, SHAPES } from './constants';
import type { ShapeSpec } from './types';
import { DifficultySchema, ShapeSpecSchema } from './types';

const CANVAS = { width: 800, height: 600 };

function spec(overrides: Partial<ShapeSpec> = {}): ShapeSpec {
  return {
    shape: 'circle',
    colorName: 'red',
    colorRGB: [248, 113, 113],
    start: new Vector(100, 200),
    target: new Vector(500, 300),
    size: 60,
    ...overrides,
  };
}

describe('sampling', () => {
  it('draws distinct shapes and colors while the palette lasts', () => {
    const rng = createRng(5);
    for (let count = 1; count <= 6; count++) {
      expect(new Set(sampleShapes(rng, count)).size).toBe(count);
      expect(new Set(sampleColors(rng, count).map(c => c.name)).size).toBe(count);
    }
  });

  it('starts with a full permutation when the count exceeds the palette', () => {
    const rng = createRng(11);
    const shapes = sampleShapes(rng, 9);
    expect(shapes).toHaveLength(9);
    expect([...shapes.slice(0, 6)].sort()).toEqual([...SHAPES].sort());
    for (const s of shapes.slice(6)) expect(SHAPES).toContain(s);

    const colors = sampleColors(rng, 8);
    expect(colors).toHaveLength(8);
    expect(colors.slice(0, 6).map(c => c.name).sort()).toEqual(COLORS.map(c => c.name).sort());
  });

  it('picks shape counts by difficulty', () => {
    const ranges = { easy: [2, 3], medium: [3, 5], hard: [5, 6] } as const;
    const rng = createRng(21);
    for (const difficulty of DifficultySchema.options) {
      const seen = new Set<number>();
      for (let i = 0; i < 200; i++) seen.add(shapeCountForDifficulty(rng, difficulty));
      const [min, max] = ranges[difficulty];
      expect(Math.min(...seen)).toBe(min);
      expect(Math.max(...seen)).toBe(max);
      expect(seen.size).toBe(max - min + 1);
    }
  });
});

describe('buildSignature', () => {
  it('rounds to one decimal and prints numbers in shortest form', () => {
    const s = spec({ start: new Vector(100.04, 200.06), target: new Vector(500, 300.26), size: 61.6 });
    expect(buildSignature([s], 'line')).toBe('line|1|circle,red,100,200.1,500,300.3,61.6');
  });

  it('does not depend on spec order', () => {
    const a = spec();
    const b = spec({ shape: 'square', colorName: 'blue', colorRGB: [96, 165, 250], start: new Vector(100, 400) });
    expect(buildSignature([a, b], 'grid')).toBe(buildSignature([b, a], 'grid'));
    expect(buildSignature([b, a], 'grid')).toBe(
      'grid|2|circle,red,100,200,500,300,60|square,blue,100,400,500,300,60',
    );
  });

  it('orders numeric fields numerically', () => {
    const a = spec({ start: new Vector(90, 200) });
    const b = spec({ start: new Vector(100, 200) });
    expect(buildSignature([b, a], 'line')).toBe('line|2|circle,red,90,200,500,300,60|circle,red,100,200,500,300,60');
  });

  it('distinguishes layouts and positions', () => {
    expect(buildSignature([spec()], 'line')).not.toBe(buildSignature([spec()], 'grid'));
    expect(buildSignature([spec()], 'line')).not.toBe(buildSignature([spec({ start: new Vector(101, 200) })], 'line'));
  });
});

describe('TaskAssembler.createSpecs', () => {
  it('puts cards on the left, slots on the right, all one size', () => {
    for (let seed = 0; seed < 30; seed++) {
      const assembler = new TaskAssembler(CANVAS, createRng(seed));
      for (let count = 1; count <= 8; count++) {
        const { specs } = assembler.createSpecs(count);
        expect(specs).toHaveLength(count);
        for (const s of specs) {
          expect(() => ShapeSpecSchema.parse(s)).not.toThrow();
          expect(s.start.x).toBeGreaterThanOrEqual(96);
          expect(s.start.x).toBeLessThanOrEqual(320);
          expect(s.target.x).toBeGreaterThanOrEqual(480);
          expect(s.target.x).toBeLessThanOrEqual(704);
          for (const y of [s.start.y, s.target.y]) {
            expect(y).toBeGreaterThanOrEqual(108);
            expect(y).toBeLessThanOrEqual(492);
          }
          expect(s.size).toBe(specs[0].size);
          expect(s.size).toBeLessThanOrEqual(90);
        }
      }
    }
  });

  it('sizes shapes to the densest side', () => {
    const assembler = new TaskAssembler(CANVAS, createRng(1));
    // 5 shapes, scatter: 2 columns × 3 rows on both sides; cell 112 × 128
    const { specs, layoutVariant } = assembler.createSpecs(5);
    expect(layoutVariant).toBe('scatter');
    expect(specs[0].size).toBeCloseTo(112 * 0.55, 10);

    // 3 shapes, staggered: cards 2 × 2 (cell 112 × 192), slots 1 × 3 (cell 224 × 128)
    const staggered = assembler.createSpecs(3);
    expect(staggered.layoutVariant).toBe('staggered');
    expect(staggered.specs[0].size).toBeCloseTo(112 * 0.55, 10);
  });

  it('gives distinct shape/color pairs for six shapes', () => {
    const { specs } = new TaskAssembler(CANVAS, createRng(4)).createSpecs(6);
    expect(new Set(specs.map(s => s.shape)).size).toBe(6);
    expect(new Set(specs.map(s => s.colorName)).size).toBe(6);
  });

  it('keeps each color name with its own RGB', () => {
    const { specs } = new TaskAssembler(CANVAS, createRng(8)).createSpecs(4);
    for (const s of specs) {
      expect(s.colorRGB).toEqual(COLORS.find(c => c.name === s.colorName)?.rgb);
    }
  });
});

describe('TaskAssembler.generateTaskData', () => {
  it('records a fresh signature per accepted task', () => {
    const assembler = new TaskAssembler(CANVAS, createRng(3));
    const a = assembler.generateTaskData('medium');
    const b = assembler.generateTaskData('medium');
    expect(assembler.seenSignatures.size).toBe(2);
    expect(assembler.seenSignatures.has(buildSignature(a.specs, a.layoutVariant))).toBe(true);
    expect(assembler.seenSignatures.has(buildSignature(b.specs, b.layoutVariant))).toBe(true);
  });

  it('reports the difficulty and shape count it used', () => {
    const data = new TaskAssembler(CANVAS, createRng(12)).generateTaskData('hard');
    expect(data.difficulty).toBe('hard');
    expect(data.numShapes).toBe(data.specs.length);
    expect(data.numShapes).toBeGreaterThanOrEqual(5);
    expect(data.numShapes).toBeLessThanOrEqual(6);
    expect(data.layoutVariant).toBe('scatter');
  });

  it('falls back to an unrecorded duplicate when every attempt collides', () => {
    // A constant source makes every generation identical
    const assembler = new TaskAssembler(CANVAS, () => 0);
    const first = assembler.generateTaskData('easy');
    const second = assembler.generateTaskData('easy');
    expect(buildSignature(second.specs, second.layoutVariant)).toBe(buildSignature(first.specs, first.layoutVariant));
    expect(assembler.seenSignatures.size).toBe(1);
  });

  it('keeps dedup history per instance', () => {
    const a = new TaskAssembler(CANVAS, createRng(77)).generateTaskData('medium');
    const b = new TaskAssembler(CANVAS, createRng(77)).generateTaskData('medium');
    expect(buildSignature(b.specs, b.layoutVariant)).toBe(buildSignature(a.specs, a.layoutVariant));
  });
});
