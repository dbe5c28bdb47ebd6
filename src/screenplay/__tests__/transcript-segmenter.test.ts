import { describe, it, expect } from 'vitest';
import {
  countScenes,
  episodeSummaries,
  extractEpisodes,
  formatEpisodeId,
  parseEpisodeHeader,
} from '../transcript-segmenter';

describe('extractEpisodes', () => {
  it('files a closed scene under the episode named inside it', () => {
    const result = extractEpisodes('=== Scene 1 ===\n1x02 The Bicycle Thief\nSome dialogue.\n---\n');

    const scene = '=== Scene 1 ===\n1x02 The Bicycle Thief\nSome dialogue.';
    expect(result.episodes).toEqual({
      S1E02: { title: 'The Bicycle Thief', scenes: [scene] },
    });
    expect(result.scenes).toEqual([{ episode: 'S1E02', title: 'The Bicycle Thief', scene }]);
  });

  it('drops scenes that close before any episode header', () => {
    const result = extractEpisodes(
      ['=== Scene 1 ===', 'Hello', '---', '=== Scene 2 ===', '1x01 Pilot', 'Hi', '---'].join('\n')
    );

    expect(result.episodes).toEqual({
      S1E01: { title: 'Pilot', scenes: ['=== Scene 2 ===\n1x01 Pilot\nHi'] },
    });
    expect(result.scenes).toHaveLength(1);
  });

  it('keeps filing scenes under the last episode header seen', () => {
    const result = extractEpisodes(
      [
        '=== Scene 1 ===', '1x01 Pilot', 'A', '---',
        '=== Scene 2 ===', 'B', '---',
        '=== Scene 3 ===', '1x02 The Bicycle Thief', 'C', '---',
      ].join('\n')
    );

    expect(result.episodes.S1E01.scenes).toEqual(['=== Scene 1 ===\n1x01 Pilot\nA', '=== Scene 2 ===\nB']);
    expect(result.episodes.S1E02.scenes).toEqual(['=== Scene 3 ===\n1x02 The Bicycle Thief\nC']);
    expect(result.scenes.map((s) => s.episode)).toEqual(['S1E01', 'S1E01', 'S1E02']);
  });

  it('discards a scene that never closes', () => {
    const result = extractEpisodes(
      ['=== Scene 1 ===', '1x01 Pilot', 'A', '---', '=== Scene 2 ===', 'Dangling line'].join('\n')
    );

    expect(result.episodes.S1E01.scenes).toEqual(['=== Scene 1 ===\n1x01 Pilot\nA']);
    expect(result.scenes).toHaveLength(1);
  });

  it('registers an episode header even when its scene never closes', () => {
    const result = extractEpisodes(['=== Scene 1 ===', '1x03 Come Fly with Me', 'Text'].join('\n'));

    expect(result.episodes).toEqual({ S1E03: { title: 'Come Fly with Me', scenes: [] } });
    expect(result.scenes).toEqual([]);
  });

  it('keeps the first title for a repeated episode id', () => {
    const result = extractEpisodes(
      [
        '=== Scene 1 ===', '1x02 The Bicycle Thief', 'A', '---',
        '=== Scene 2 ===', '1x02 Bicycle Thief (Redux)', 'B', '---',
      ].join('\n')
    );

    expect(result.episodes.S1E02.title).toBe('The Bicycle Thief');
    expect(result.episodes.S1E02.scenes).toHaveLength(2);
    expect(result.scenes.map((s) => s.title)).toEqual(['The Bicycle Thief', 'Bicycle Thief (Redux)']);
  });

  it('requires both the open marker and the word Scene', () => {
    const result = extractEpisodes(
      ['=== Act One ===', '1x01 Pilot', 'A', '---', '=== scene 2 ===', 'B', '---'].join('\n')
    );

    expect(result.episodes).toEqual({});
    expect(result.scenes).toEqual([]);
  });

  it('ignores episode headers outside a scene', () => {
    const result = extractEpisodes(['1x05 Coal Digger', '=== Scene 1 ===', 'Text', '---'].join('\n'));

    expect(result.episodes).toEqual({});
    expect(result.scenes).toEqual([]);
  });

  it('trims lines, including carriage returns', () => {
    const result = extractEpisodes('  === Scene 1 ===  \r\n  1x02   The Bicycle Thief  \r\n---\r\n');

    expect(result.episodes).toEqual({
      S1E02: { title: 'The Bicycle Thief', scenes: ['=== Scene 1 ===\n1x02   The Bicycle Thief'] },
    });
  });

  it('keeps line separators inside an episode title', () => {
    const result = extractEpisodes('=== Scene 1 ===\n1x02 The Bicycle\rThief\nx\n---');

    expect(result.episodes).toEqual({
      S1E02: { title: 'The Bicycle\rThief', scenes: ['=== Scene 1 ===\n1x02 The Bicycle\rThief\nx'] },
    });
    expect(parseEpisodeHeader('2x01 Bixby\u2028Returns')).toEqual({ id: 'S2E01', title: 'Bixby\u2028Returns' });
  });

  it('restarts the buffer when a scene opens inside a scene', () => {
    const result = extractEpisodes(
      ['=== Scene 1 ===', '1x01 Pilot', 'A', '=== Scene 2 ===', 'B', '---'].join('\n')
    );

    expect(result.episodes.S1E01.scenes).toEqual(['=== Scene 2 ===\nB']);
  });

  it('keeps blank lines inside a scene', () => {
    const result = extractEpisodes(['=== Scene 1 ===', '2x10 Mother Tucker', '', 'Line', '---'].join('\n'));

    expect(result.scenes[0].scene).toBe('=== Scene 1 ===\n2x10 Mother Tucker\n\nLine');
  });

  it('returns empty structures for empty input', () => {
    expect(extractEpisodes('')).toEqual({ episodes: {}, scenes: [] });
  });

  it('commits as many scenes to episodes as to the flat list', () => {
    const result = extractEpisodes(
      [
        '=== Scene 1 ===', 'orphan', '---',
        '=== Scene 2 ===', '1x01 Pilot', '---',
        '=== Scene 3 ===', '2x04 Pilot Two', '---',
        '=== Scene 4 ===', 'x', '---',
        '=== Scene 5 ===', 'never closed',
      ].join('\n')
    );

    expect(countScenes(result)).toBe(result.scenes.length);
    expect(result.scenes).toHaveLength(3);
  });
});

describe('parseEpisodeHeader', () => {
  it('parses season, episode and title', () => {
    expect(parseEpisodeHeader('1x02 The Bicycle Thief')).toEqual({ id: 'S1E02', title: 'The Bicycle Thief' });
    expect(parseEpisodeHeader('3x10')).toEqual({ id: 'S3E10', title: '' });
  });

  it('only matches at the start of the line', () => {
    expect(parseEpisodeHeader('Episode 1x02')).toBeNull();
    expect(parseEpisodeHeader('=== Scene 1 ===')).toBeNull();
  });
});

describe('formatEpisodeId', () => {
  it('pads the episode number to two digits', () => {
    expect(formatEpisodeId('1', '2')).toBe('S1E02');
    expect(formatEpisodeId('10', '3')).toBe('S10E03');
    expect(formatEpisodeId('2', '123')).toBe('S2E123');
  });
});

describe('episodeSummaries', () => {
  it('lists episodes in encounter order with scene counts', () => {
    const result = extractEpisodes(
      [
        '=== Scene 1 ===', '2x01 The Old Wagon', 'A', '---',
        '=== Scene 2 ===', '1x24 Family Portrait', 'B', '---',
        '=== Scene 3 ===', 'C', '---',
      ].join('\n')
    );

    expect(episodeSummaries(result)).toEqual([
      { id: 'S2E01', title: 'The Old Wagon', sceneCount: 1 },
      { id: 'S1E24', title: 'Family Portrait', sceneCount: 2 },
    ]);
  });
});
