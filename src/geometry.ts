import { Vector } from 'vecti';
import type { ShapeKind } from './types';
import { InvalidShapeError } from './errors';

/** What the canvas needs to trace a shape: a bounding box or a vertex loop. */
export type ShapeGeometry =
  | { kind: 'ellipse'; center: Vector; radius: number }
  | { kind: 'rect'; x: number; y: number; width: number; height: number }
  | { kind: 'polygon'; points: Vector[] };

const STAR_INNER_RATIO = 0.45;

function boundingRect(center: Vector, size: number): ShapeGeometry {
  return { kind: 'rect', x: center.x - size / 2, y: center.y - size / 2, width: size, height: size };
}

/** Isosceles, apex up, base on the bottom edge of the bounding box. */
export function trianglePoints(center: Vector, size: number): Vector[] {
  const h = size / 2;
  return [
    new Vector(center.x, center.y - h),
    new Vector(center.x - h, center.y + h),
    new Vector(center.x + h, center.y + h),
  ];
}

/** Regular hexagon, circumradius size/2, first vertex 30° below the +x axis. */
export function hexagonPoints(center: Vector, size: number): Vector[] {
  const r = size / 2;
  const points: Vector[] = [];
  for (let i = 0; i < 6; i++) {
    const angle = Math.PI / 6 + i * Math.PI / 3;
    points.push(new Vector(center.x + r * Math.cos(angle), center.y + r * Math.sin(angle)));
  }
  return points;
}

/** N, E, S, W of the bounding box. */
export function diamondPoints(center: Vector, size: number): Vector[] {
  const h = size / 2;
  return [
    new Vector(center.x, center.y - h),
    new Vector(center.x + h, center.y),
    new Vector(center.x, center.y + h),
    new Vector(center.x - h, center.y),
  ];
}

/**
 * Five-pointed star: ten vertices 36° apart, alternating between the outer
 * radius (size/2) and the inner radius, starting with the top point.
 * Canvas y grows downward, so "up" is -90°.
 */
export function starPoints(center: Vector, size: number): Vector[] {
  const outer = size / 2;
  const inner = outer * STAR_INNER_RATIO;
  const points: Vector[] = [];
  for (let i = 0; i < 10; i++) {
    const angle = -Math.PI / 2 + i * Math.PI / 5;
    const r = i % 2 === 0 ? outer : inner;
    points.push(new Vector(center.x + r * Math.cos(angle), center.y + r * Math.sin(angle)));
  }
  return points;
}

export function shapeGeometry(shape: ShapeKind, center: Vector, size: number): ShapeGeometry {
  switch (shape) {
    case 'circle':
      return { kind: 'ellipse', center, radius: size / 2 };
    case 'square':
      return boundingRect(center, size);
    case 'triangle':
      return { kind: 'polygon', points: trianglePoints(center, size) };
    case 'hexagon':
      return { kind: 'polygon', points: hexagonPoints(center, size) };
    case 'diamond':
      return { kind: 'polygon', points: diamondPoints(center, size) };
    case 'star':
      return { kind: 'polygon', points: starPoints(center, size) };
    default:
      throw new InvalidShapeError(shape satisfies never);
  }
}
