/**
 * DashboardServer - JSON API for the character interaction dashboard.
 *
 * Endpoints:
 *   GET /api/options                     - allowed thresholds and top-N bounds
 *   GET /api/characters                  - characters at a threshold, sorted
 *   GET /api/top-connected               - most connected characters
 *   GET /api/top-pairs                   - strongest pairs
 *   GET /api/path?from=&to=              - shortest relationship path
 *   GET /api/characters/:name/stats      - per-character stats
 *
 * Every endpoint takes `minScenes` (one of the allowed thresholds) and the
 * rankings take `limit`.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type * as http from 'http';
import { DashboardApi, statusForError } from './dashboard-api';
import type { DatasetManager } from './dataset-manager';
import { EnsembleError } from '../shared/errors';
import { createLogger } from '../shared/logger';
import type { DashboardOptions } from '../shared/types';

const log = createLogger('Dashboard');

export function createDashboardApp(api: DashboardApi): express.Express {
  const app = express();

  app.get('/api/options', (_req: Request, res: Response) => {
    res.json(api.getOptions());
  });

  app.get('/api/characters', (req: Request, res: Response) => {
    res.json(api.listCharacters(req.query));
  });

  app.get('/api/top-connected', (req: Request, res: Response) => {
    res.json(api.topConnected(req.query));
  });

  app.get('/api/top-pairs', (req: Request, res: Response) => {
    res.json(api.topPairs(req.query));
  });

  app.get('/api/path', (req: Request, res: Response) => {
    res.json(api.path(req.query));
  });

  app.get('/api/characters/:name/stats', (req: Request, res: Response) => {
    res.json(api.stats(req.params.name, req.query));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const error = EnsembleError.from(err);
    const status = statusForError(error);
    if (status >= 500) {
      log.error('Request failed:', error);
    }
    res.status(status).json({ success: false, error: error.message, code: error.code });
  });

  return app;
}

export class DashboardServer {
  private readonly dataset: DatasetManager;
  private readonly app: express.Express;
  private readonly port: number;
  private readonly watchData: boolean;
  private server: http.Server | null = null;

  constructor(dataset: DatasetManager, options: DashboardOptions & { port: number; watchDataFile: boolean }) {
    this.dataset = dataset;
    this.port = options.port;
    this.watchData = options.watchDataFile;
    this.app = createDashboardApp(new DashboardApi(dataset.session, options));
  }

  async start(): Promise<void> {
    if (this.server) return;

    await this.dataset.load();
    if (this.watchData) {
      this.dataset.watch();
    }

    try {
      this.server = await new Promise<http.Server>((resolve, reject) => {
        const server = this.app.listen(this.port, () => {
          log.info(`Dashboard API listening on http://localhost:${this.port}`);
          resolve(server);
        });
        server.once('error', reject);
      });
    } catch (error) {
      await this.dataset.destroy();
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.dataset.destroy();

    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    log.info('Dashboard API stopped');
  }
}
