import chokidar from 'chokidar';
import { loadCoAppearances } from './coappearance-loader';
import { GraphSession } from '../graph/graph-session';
import { createLogger } from '../shared/logger';

const log = createLogger('DatasetManager');

/**
 * Owns the GraphSession for one data file and, optionally, keeps it in
 * step with the file on disk.
 */
export class DatasetManager {
  readonly session: GraphSession;
  private readonly dataFile: string;
  private watcher: chokidar.FSWatcher | null = null;
  private reloading: Promise<void> = Promise.resolve();

  constructor(dataFile: string, session: GraphSession = new GraphSession()) {
    this.dataFile = dataFile;
    this.session = session;
  }

  async load(): Promise<void> {
    const records = await loadCoAppearances(this.dataFile);
    this.session.replaceRecords(records);
  }

  /**
   * Reload after an external change. A failed reload keeps the previous table.
   */
  async reload(): Promise<boolean> {
    try {
      await this.load();
      return true;
    } catch (error) {
      log.error(`Reload of ${this.dataFile} failed, keeping previous data:`, error);
      return false;
    }
  }

  watch(): void {
    if (this.watcher) return;

    this.watcher = chokidar.watch(this.dataFile, {
      persistent: true,
      ignoreInitial: true,
    });

    this.watcher.on('change', () => {
      log.info('Data file changed externally, reloading');
      this.reloading = this.reloading.then(async () => {
        await this.reload();
      });
    });

    this.watcher.on('error', (error) => {
      log.error(`Watching ${this.dataFile} failed:`, error);
    });
  }

  /** Resolves once every queued reload has finished */
  whenIdle(): Promise<void> {
    return this.reloading;
  }

  async destroy(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }
}
