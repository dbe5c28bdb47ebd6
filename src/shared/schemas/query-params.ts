/**
 * Zod schemas for dashboard API query parameters.
 *
 * Query strings arrive as strings; numbers are accepted only when they are
 * plain digit sequences.
 */

import { z } from 'zod';
import type { DashboardOptions } from '../types';

const digits = z
  .string()
  .regex(/^\d+$/, 'must be a whole number')
  .transform(Number);

const characterName = z.string().min(1, 'must not be empty');

export function minScenesParam(options: DashboardOptions) {
  return digits
    .refine((value) => options.minScenesOptions.includes(value), {
      message: `must be one of ${options.minScenesOptions.join(', ')}`,
    })
    .optional()
    .transform((value) => value ?? options.defaultMinScenes);
}

export function limitParam(options: DashboardOptions) {
  return digits
    .refine((value) => value >= 1 && value <= options.maxTopN, {
      message: `must be between 1 and ${options.maxTopN}`,
    })
    .optional()
    .transform((value) => value ?? options.defaultTopN);
}

export function createQuerySchemas(options: DashboardOptions) {
  const minScenes = minScenesParam(options);
  const limit = limitParam(options);

  return {
    characters: z.object({ minScenes }),
    ranking: z.object({ minScenes, limit }),
    path: z.object({ minScenes, from: characterName, to: characterName }),
    stats: z.object({ minScenes, name: characterName }),
  };
}

export type QuerySchemas = ReturnType<typeof createQuerySchemas>;
