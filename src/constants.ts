import type { ColorName, Rgb, ShapeKind } from './types';

export const COLORS: readonly { name: ColorName; rgb: Rgb }[] = [
  { name: 'red', rgb: [248, 113, 113] },    // #f87171
  { name: 'yellow', rgb: [250, 204, 21] },  // #facc15
  { name: 'blue', rgb: [96, 165, 250] },    // #60a5fa
  { name: 'green', rgb: [74, 222, 128] },   // #4ade80
  { name: 'purple', rgb: [192, 132, 252] }, // #c084fc
  { name: 'orange', rgb: [251, 146, 60] },  // #fb923c
];

export const SHAPES: readonly ShapeKind[] = ['circle', 'square', 'triangle', 'star', 'hexagon', 'diamond'];

export const BOARD = {
  background: [248, 250, 252],  // #f8fafc
  divider: [148, 163, 184],     // #94a3b8
  outline: [100, 116, 139],     // #64748b
  dividerWidth: 8,
  dividerMargin: 40,
  dividerOpacity: 0.35,
  slotLineWidth: 3,
} as const;

/** Fractional extents of the card and slot regions. */
export const REGIONS = {
  cards: { x: [0.12, 0.4], y: [0.18, 0.82] },
  slots: { x: [0.6, 0.88], y: [0.18, 0.82] },
} as const;

export const MAX_SHAPE_SIZE = 90;
export const CELL_FILL = 0.55;

export const UNIQUE_ATTEMPTS = 25;
export const HOLD_FRAMES = 3;
export const MIN_TRANSITION_FRAMES = 10;
