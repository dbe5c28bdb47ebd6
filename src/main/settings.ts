import fs from 'fs/promises';
import path from 'path';
import { AppSettingsSchema, type AppSettings } from '../shared/schemas/settings-schema';
import { EnsembleError, ErrorCode } from '../shared/errors';
import { createLogger } from '../shared/logger';

const log = createLogger('Settings');

export const DEFAULT_SETTINGS_FILE = 'ensemble.settings.json';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Resolve the data, transcript and snapshot paths against the directory
 * holding the settings file.
 */
function resolvePaths(settings: AppSettings, baseDir: string): AppSettings {
  return {
    ...settings,
    dataFile: path.resolve(baseDir, settings.dataFile),
    transcriptFile: path.resolve(baseDir, settings.transcriptFile),
    episodesFile: path.resolve(baseDir, settings.episodesFile),
  };
}

export function parseSettings(raw: unknown): AppSettings {
  const result = AppSettingsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new EnsembleError(`Invalid settings: ${details}`, ErrorCode.CONFIG_VALIDATION_ERROR, {
      context: { issues: result.error.issues },
    });
  }
  return result.data;
}

/**
 * Load settings from a JSON file. A missing file gives the defaults.
 */
export async function loadSettings(settingsPath: string = DEFAULT_SETTINGS_FILE): Promise<AppSettings> {
  const absolutePath = path.resolve(settingsPath);
  const baseDir = path.dirname(absolutePath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      log.debug(`No settings file at ${absolutePath}, using defaults`);
      return resolvePaths(parseSettings({}), baseDir);
    }
    throw EnsembleError.from(error, ErrorCode.FS_READ_ERROR, { path: absolutePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw EnsembleError.from(error, ErrorCode.CONFIG_VALIDATION_ERROR, { path: absolutePath });
  }

  const settings = resolvePaths(parseSettings(raw), baseDir);
  log.info(`Loaded settings from ${absolutePath}`);
  return settings;
}
