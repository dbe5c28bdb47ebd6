import fs from 'fs/promises';
import path from 'path';
import { extractEpisodes, episodeSummaries } from '../screenplay/transcript-segmenter';
import { EnsembleError, ErrorCode } from '../shared/errors';
import { createLogger } from '../shared/logger';
import type { SegmentedTranscript } from '../shared/types';

const log = createLogger('Transcript');

export const DEFAULT_PREVIEW_CHARS = 500;

/**
 * Read a transcript file, segment it and log one line per episode.
 */
export async function processTranscriptFile(filePath: string): Promise<SegmentedTranscript> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code =
      error instanceof Error && 'code' in error && error.code === 'ENOENT'
        ? ErrorCode.FS_NOT_FOUND
        : ErrorCode.FS_READ_ERROR;
    throw EnsembleError.from(error, code, { path: filePath });
  }

  const transcript = extractEpisodes(text);
  const summaries = episodeSummaries(transcript);

  log.info(`Found ${summaries.length} episodes:`);
  for (const summary of summaries) {
    log.info(`${summary.id}: ${summary.title} (${summary.sceneCount} scenes)`);
  }

  return transcript;
}

/**
 * Write the episode map as indented JSON
 */
export async function writeEpisodesSnapshot(transcript: SegmentedTranscript, outputPath: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(transcript.episodes, null, 2), 'utf-8');
  } catch (error) {
    throw EnsembleError.from(error, ErrorCode.FS_WRITE_ERROR, { path: outputPath });
  }
  log.info(`Saved episodes to: ${outputPath}`);
}

/**
 * First scene of the first episode, cut to `maxChars` code points
 */
export function formatScenePreview(transcript: SegmentedTranscript, maxChars: number = DEFAULT_PREVIEW_CHARS): string {
  const [firstEpisode] = Object.values(transcript.episodes);
  const firstScene = firstEpisode?.scenes[0];
  return firstScene ? Array.from(firstScene).slice(0, maxChars).join('') : '';
}
