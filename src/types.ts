import { z } from 'zod';
import { Vector } from 'vecti';

export { Vector } from 'vecti';

export const ShapeKindSchema = z.enum(['circle', 'square', 'triangle', 'star', 'hexagon', 'diamond']);
export type ShapeKind = z.infer<typeof ShapeKindSchema>;

export const ColorNameSchema = z.enum(['red', 'yellow', 'blue', 'green', 'purple', 'orange']);
export type ColorName = z.infer<typeof ColorNameSchema>;

export const LayoutVariantSchema = z.enum(['line', 'staggered', 'grid', 'scatter']);
export type LayoutVariant = z.infer<typeof LayoutVariantSchema>;

export const DifficultySchema = z.enum(['easy', 'medium', 'hard']);
export type Difficulty = z.infer<typeof DifficultySchema>;

/** Which half of the board a set of positions belongs to. */
export const SideSchema = z.enum(['cards', 'slots']);
export type Side = z.infer<typeof SideSchema>;

export const RgbSchema = z.tuple([
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
]).readonly();
export type Rgb = z.infer<typeof RgbSchema>;

export const VectorSchema = z.instanceof(Vector);

export const ShapeSpecSchema = z.object({
  shape: ShapeKindSchema,
  colorName: ColorNameSchema,
  colorRGB: RgbSchema,
  start: VectorSchema,   // card center, left half
  target: VectorSchema,  // slot center, right half
  size: z.number().positive(),
});
export type ShapeSpec = Readonly<z.infer<typeof ShapeSpecSchema>>;

export function shapeLabel(spec: Pick<ShapeSpec, 'shape' | 'colorName'>): string {
  return `${spec.colorName} ${spec.shape}`;
}

export interface TaskData {
  specs: ShapeSpec[];
  layoutVariant: LayoutVariant;
  difficulty: Difficulty;
  numShapes: number;
}

/** An RGBA raster, the unit handed to the video encoder. */
export interface Frame {
  data: Uint8ClampedArray;
  width: number;
  height: number;
}
