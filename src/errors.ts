import type { z } from 'zod';

/** An identifier outside the shape vocabulary reached the drawing code. */
export class InvalidShapeError extends Error {
  readonly shape: unknown;

  constructor(shape: unknown) {
    super(`Unsupported shape type: ${String(shape)}`);
    this.name = 'InvalidShape';
    this.shape = shape;
  }
}

export class ConfigError extends Error {
  readonly issues: z.ZodError['issues'];

  constructor(message: string, issues: z.ZodError['issues'] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
