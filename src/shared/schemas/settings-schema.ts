/**
 * Zod schema for application settings.
 *
 * The AppSettings type is derived from this schema, so defaults and
 * validation live in one place.
 */

import { z } from 'zod';

export const DEFAULT_MIN_SCENES_OPTIONS = [1, 10, 30, 50, 100];

export const AppSettingsSchema = z
  .object({
    dataFile: z.string().min(1).default('coappearance_list.csv'),
    transcriptFile: z.string().min(1).default('modern_family_scenes.txt'),
    episodesFile: z.string().min(1).default('episodes.json'),

    port: z.number().int().min(0).max(65535).default(8501),
    watchDataFile: z.boolean().default(true),

    minScenesOptions: z
      .array(z.number().int().nonnegative())
      .min(1)
      .default(() => [...DEFAULT_MIN_SCENES_OPTIONS]),
    defaultMinScenes: z.number().int().nonnegative().default(50),
    defaultTopN: z.number().int().positive().default(5),
    maxTopN: z.number().int().positive().default(20),

    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((settings, ctx) => {
    if (!settings.minScenesOptions.includes(settings.defaultMinScenes)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultMinScenes'],
        message: `must be one of ${settings.minScenesOptions.join(', ')}`,
      });
    }
    if (settings.defaultTopN > settings.maxTopN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultTopN'],
        message: `must not exceed maxTopN (${settings.maxTopN})`,
      });
    }
  });

export type AppSettings = z.infer<typeof AppSettingsSchema>;
