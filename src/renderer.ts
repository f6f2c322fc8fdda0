import { createCanvas } from '@napi-rs/canvas';
import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import type { Vector } from 'vecti';
import type { Frame, Rgb, ShapeKind, ShapeSpec } from './types';
import { shapeGeometry } from './geometry';
import { BOARD } from './constants';

export type ShapeStyle =
  | { mode: 'fill'; color: Rgb }
  | { mode: 'outline'; color: Rgb; lineWidth?: number };

const DEFAULT_OUTLINE_WIDTH = 2;

export function rgbCss([r, g, b]: Rgb): string {
  return `rgb(${r}, ${g}, ${b})`;
}

/** `base` with `overlay` laid on top at `alpha`, truncated to integers. */
export function blendRgb(base: Rgb, overlay: Rgb, alpha: number): Rgb {
  const mix = (i: 0 | 1 | 2) => Math.trunc(base[i] * (1 - alpha) + overlay[i] * alpha);
  return [mix(0), mix(1), mix(2)];
}

export function drawShape(
  ctx: SKRSContext2D,
  shape: ShapeKind,
  center: Vector,
  size: number,
  style: ShapeStyle,
): void {
  const geom = shapeGeometry(shape, center, size);

  ctx.beginPath();
  if (geom.kind === 'ellipse') {
    ctx.arc(geom.center.x, geom.center.y, geom.radius, 0, Math.PI * 2);
  } else if (geom.kind === 'rect') {
    ctx.rect(geom.x, geom.y, geom.width, geom.height);
  } else {
    geom.points.forEach((p, i) => {
      if (i === 0) ctx.moveTo(p.x, p.y);
      else ctx.lineTo(p.x, p.y);
    });
    ctx.closePath();
  }

  if (style.mode === 'fill') {
    ctx.fillStyle = rgbCss(style.color);
    ctx.fill();
  } else {
    ctx.strokeStyle = rgbCss(style.color);
    ctx.lineWidth = Math.trunc(style.lineWidth ?? DEFAULT_OUTLINE_WIDTH);
    ctx.lineJoin = 'miter';
    ctx.stroke();
  }
}

/** Background plus the translucent center divider. */
export function drawBoard(ctx: SKRSContext2D, width: number, height: number): void {
  ctx.fillStyle = rgbCss(BOARD.background);
  ctx.fillRect(0, 0, width, height);

  const dividerX = width * 0.5;
  const half = Math.floor(BOARD.dividerWidth / 2);
  ctx.fillStyle = rgbCss(blendRgb(BOARD.background, BOARD.divider, BOARD.dividerOpacity));
  ctx.fillRect(
    dividerX - half,
    BOARD.dividerMargin,
    half * 2,
    height - 2 * BOARD.dividerMargin,
  );
}

export interface SceneOptions {
  /** Card centers, one per spec, in spec order. */
  cardPositions: readonly Vector[];
  drawOutlines: boolean;
}

export class ShapeSorterRenderer {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  /** Every outline is drawn before any card, so cards sit on top. */
  renderScene(specs: readonly ShapeSpec[], { cardPositions, drawOutlines }: SceneOptions): Canvas {
    if (cardPositions.length !== specs.length) {
      throw new Error(`Expected ${specs.length} card positions, got ${cardPositions.length}`);
    }
    const canvas = createCanvas(this.width, this.height);
    const ctx = canvas.getContext('2d');
    drawBoard(ctx, this.width, this.height);

    if (drawOutlines) {
      for (const spec of specs) {
        drawShape(ctx, spec.shape, spec.target, spec.size, {
          mode: 'outline',
          color: BOARD.outline,
          lineWidth: BOARD.slotLineWidth,
        });
      }
    }
    specs.forEach((spec, i) => {
      drawShape(ctx, spec.shape, cardPositions[i], spec.size, { mode: 'fill', color: spec.colorRGB });
    });
    return canvas;
  }

  /** Cards on the left, empty outlines on the right. */
  renderStart(specs: readonly ShapeSpec[]): Canvas {
    return this.renderScene(specs, { cardPositions: specs.map(s => s.start), drawOutlines: true });
  }

  /** Every card in its slot; the outlines are covered, so none are drawn. */
  renderEnd(specs: readonly ShapeSpec[]): Canvas {
    return this.renderScene(specs, { cardPositions: specs.map(s => s.target), drawOutlines: false });
  }
}

/** Copy a canvas's pixels into a buffer the caller owns. */
export function captureFrame(canvas: Canvas): Frame {
  const { data, width, height } = canvas.getContext('2d').getImageData(0, 0, canvas.width, canvas.height);
  return { data: new Uint8ClampedArray(data), width, height };
}
