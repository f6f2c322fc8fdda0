import { z } from 'zod';
import { DifficultySchema } from './types';
import { BOARD } from './constants';
import { ConfigError } from './errors';

export const TaskConfigSchema = z.object({
  domain: z.string().min(1).default('shape_sorter'),
  width: z.number().int().positive().default(800),
  height: z.number().int()
    .gt(2 * BOARD.dividerMargin, `must leave room for the ${BOARD.dividerMargin}px divider margins`)
    .default(600),
  difficulty: DifficultySchema.default('medium'),
  generateVideos: z.boolean().default(false),
  videoFps: z.number().int().positive().default(10),
  maxVideoDuration: z.number().positive().default(10),
});
export type TaskConfig = z.infer<typeof TaskConfigSchema>;
export type TaskConfigInput = z.input<typeof TaskConfigSchema>;

/** One line per issue, prefixed with the offending field. */
export function formatConfigError(error: z.ZodError): string {
  const lines = error.issues.map(issue => {
    const fieldPath = issue.path.map(String).join('.');
    return `${fieldPath ? `"${fieldPath}"` : 'root'}: ${issue.message}`;
  });
  return lines.length > 0 ? lines.join('\n') : 'Unknown validation error';
}

export function parseTaskConfig(raw: unknown): TaskConfig {
  const result = TaskConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid task configuration:\n${formatConfigError(result.error)}`, result.error.issues);
  }
  return result.data;
}
