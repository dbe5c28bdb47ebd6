/**
 * TranscriptSegmenter - splits a raw episode transcript into scenes
 *
 * The transcript convention:
 *   === Scene 1 ===          opens a scene (starts with "===" and mentions "Scene")
 *   1x02 The Bicycle Thief   episode header, seen inside a scene
 *   ---                      closes the scene
 *
 * An episode header does not open or close anything. It only changes which
 * episode the scene being read is filed under when it closes. Scenes that
 * close before any episode header, or never close, are dropped.
 */

import type { EpisodeRecord, EpisodeSummary, SceneRecord, SegmentedTranscript } from '../shared/types';

const SCENE_OPEN_MARKER = '===';
const SCENE_OPEN_WORD = 'Scene';
const SCENE_CLOSE_MARKER = '---';
const EPISODE_PATTERN = /^(\d+)x(\d+)\s*([^\n]*)/;

export interface EpisodeHeader {
  id: string;
  title: string;
}

/**
 * Build the canonical episode id, e.g. season "1", episode "2" -> "S1E02"
 */
export function formatEpisodeId(season: string, episode: string): string {
  return `S${season}E${episode.padStart(2, '0')}`;
}

/**
 * Parse an episode header line such as "1x02 The Bicycle Thief"
 */
export function parseEpisodeHeader(line: string): EpisodeHeader | null {
  const match = EPISODE_PATTERN.exec(line);
  if (!match) return null;

  const [, season, episode, rest] = match;
  return { id: formatEpisodeId(season, episode), title: rest.trim() };
}

function isSceneOpen(line: string): boolean {
  return line.startsWith(SCENE_OPEN_MARKER) && line.includes(SCENE_OPEN_WORD);
}

function isSceneClose(line: string): boolean {
  return line.startsWith(SCENE_CLOSE_MARKER);
}

/**
 * Segment a transcript into episodes and scenes.
 *
 * @returns the episode map (id -> first-seen title and scenes) and a flat
 * list of every committed scene in the order it was read
 */
export function extractEpisodes(text: string): SegmentedTranscript {
  const episodes = new Map<string, EpisodeRecord>();
  const scenes: SceneRecord[] = [];

  let inScene = false;
  let sceneBuffer: string[] = [];
  let currentEpisode: string | null = null;
  let currentTitle: string | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    if (isSceneOpen(line)) {
      inScene = true;
      sceneBuffer = [line];
      continue;
    }

    if (!inScene) continue;

    if (isSceneClose(line)) {
      inScene = false;
      const episode = currentEpisode ? episodes.get(currentEpisode) : undefined;
      if (sceneBuffer.length > 0 && currentEpisode && episode) {
        const scene = sceneBuffer.join('\n');
        episode.scenes.push(scene);
        scenes.push({ episode: currentEpisode, title: currentTitle ?? '', scene });
      }
      sceneBuffer = [];
      continue;
    }

    sceneBuffer.push(line);

    const header = parseEpisodeHeader(line);
    if (header) {
      currentEpisode = header.id;
      currentTitle = header.title;
      if (!episodes.has(header.id)) {
        episodes.set(header.id, { title: header.title, scenes: [] });
      }
    }
  }

  return { episodes: Object.fromEntries(episodes), scenes };
}

/**
 * Per-episode scene counts in encounter order
 */
export function episodeSummaries(transcript: SegmentedTranscript): EpisodeSummary[] {
  return Object.entries(transcript.episodes).map(([id, episode]) => ({
    id,
    title: episode.title,
    sceneCount: episode.scenes.length,
  }));
}

/**
 * Count of committed scenes across all episodes
 */
export function countScenes(transcript: SegmentedTranscript): number {
  return Object.values(transcript.episodes).reduce((total, episode) => total + episode.scenes.length, 0);
}
