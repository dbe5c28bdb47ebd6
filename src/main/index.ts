#!/usr/bin/env node
import path from 'path';
import { parseArgs } from 'util';
import { DashboardServer } from './dashboard-server';
import { DatasetManager } from './dataset-manager';
import { DEFAULT_SETTINGS_FILE, loadSettings } from './settings';
import { formatScenePreview, processTranscriptFile, writeEpisodesSnapshot } from './transcript-processor';
import { EnsembleError } from '../shared/errors';
import { createLogger, setLogLevel } from '../shared/logger';

const log = createLogger('Main');

const USAGE = `Usage:
  ensemble-graph segment [transcript] [--out episodes.json] [--preview] [--config ${DEFAULT_SETTINGS_FILE}]
  ensemble-graph serve [--port 8501] [--config ${DEFAULT_SETTINGS_FILE}]`;

async function runSegment(args: string[], configPath: string | undefined, out: string | undefined, preview: boolean) {
  const settings = await loadSettings(configPath);
  setLogLevel(settings.logLevel);

  const transcriptFile = args[0] ? path.resolve(args[0]) : settings.transcriptFile;
  const outputFile = out ? path.resolve(out) : settings.episodesFile;

  const transcript = await processTranscriptFile(transcriptFile);
  await writeEpisodesSnapshot(transcript, outputFile);

  if (preview) {
    console.log('\nExample scene from first episode:');
    console.log(formatScenePreview(transcript));
  }
}

async function runServe(configPath: string | undefined, port: string | undefined) {
  const settings = await loadSettings(configPath);
  setLogLevel(settings.logLevel);

  const portNumber = port !== undefined ? Number(port) : settings.port;
  if (!Number.isInteger(portNumber) || portNumber < 0 || portNumber > 65535) {
    throw new Error(`Invalid port: ${port}`);
  }

  const server = new DashboardServer(new DatasetManager(settings.dataFile), {
    ...settings,
    port: portNumber,
  });
  await server.start();

  const shutdown = () => {
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      out: { type: 'string', short: 'o' },
      port: { type: 'string', short: 'p' },
      preview: { type: 'boolean', default: false },
    },
  });

  const [command, ...rest] = positionals;
  switch (command) {
    case 'segment':
      await runSegment(rest, values.config, values.out, values.preview ?? false);
      return 0;
    case 'serve':
      await runServe(values.config, values.port);
      return 0;
    default:
      console.error(USAGE);
      return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      if (code !== 0) process.exit(code);
    },
    (error: unknown) => {
      if (EnsembleError.isEnsembleError(error)) {
        log.error(`${error.code}: ${error.message}`);
      } else {
        log.error('Failed:', error);
      }
      process.exit(1);
    },
  );
}
