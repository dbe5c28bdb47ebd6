import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { main } from '../index';
import { setLogLevel } from '../../shared/logger';

describe('CLI', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ensemble-cli-'));
    await fs.writeFile(
      path.join(dir, 'settings.json'),
      JSON.stringify({ logLevel: 'error', transcriptFile: 'scenes.txt', episodesFile: 'episodes.json' }),
      'utf-8'
    );
    await fs.writeFile(
      path.join(dir, 'scenes.txt'),
      ['=== Scene 1 ===', '1x01 Pilot', 'Hello', '---'].join('\n'),
      'utf-8'
    );
  });

  afterAll(async () => {
    setLogLevel('info');
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('segments the configured transcript and writes the snapshot', async () => {
    const code = await main(['segment', '--config', path.join(dir, 'settings.json')]);

    expect(code).toBe(0);
    const episodes: unknown = JSON.parse(await fs.readFile(path.join(dir, 'episodes.json'), 'utf-8'));
    expect(episodes).toEqual({
      S1E01: { title: 'Pilot', scenes: ['=== Scene 1 ===\n1x01 Pilot\nHello'] },
    });
  });

  it('honours an explicit transcript and output path', async () => {
    const out = path.join(dir, 'custom', 'out.json');

    const code = await main([
      'segment',
      path.join(dir, 'scenes.txt'),
      '--out',
      out,
      '--config',
      path.join(dir, 'settings.json'),
    ]);

    expect(code).toBe(0);
    await expect(fs.readFile(out, 'utf-8')).resolves.toContain('"S1E01"');
  });

  it('prints usage and fails for an unknown command', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(main(['explode'])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);

    errorSpy.mockRestore();
  });
});
