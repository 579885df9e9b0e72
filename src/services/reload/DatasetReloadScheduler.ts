import cron, { ScheduledTask } from 'node-cron';
import fs from 'fs';
import { DatasetPaths, LoadedDataset } from '../ingestion/DatasetLoader';
import { EngineRegistry } from '../recommendation/EngineRegistry';
import { CacheRepository } from '../../repositories/CacheRepository';

export type DatasetLoaderFn = (paths: DatasetPaths) => Promise<LoadedDataset>;

interface FileStamps {
  records: number;
  catalog: number;
}

/**
 * Rebuilds the graph and genre tree when the source files change on disk.
 * A failed reload leaves the previous engine serving.
 */
export class DatasetReloadScheduler {
  private task: ScheduledTask | null = null;
  private lastStamps: FileStamps | null = null;
  private reloading = false;

  constructor(
    private paths: DatasetPaths,
    private registry: EngineRegistry,
    private load: DatasetLoaderFn,
    private cache?: CacheRepository
  ) {}

  /**
   * Record the modification times of the files the active engine was built from
   */
  async markLoaded(): Promise<void> {
    this.lastStamps = await this.readStamps();
  }

  start(expression: string): void {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression for dataset reload: ${expression}`);
    }
    this.stop();
    this.task = cron.schedule(expression, () => {
      this.checkForChanges().catch(error => {
        console.error('❌ Dataset reload check failed:', error);
      });
    });
    console.log(`⏰ Dataset reload scheduled (${expression})`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  /**
   * Reload when either file's modification time moved; returns whether a reload happened
   */
  async checkForChanges(): Promise<boolean> {
    if (this.reloading) return false;

    let stamps: FileStamps;
    try {
      stamps = await this.readStamps();
    } catch (error) {
      console.error('❌ Cannot stat dataset files, keeping current engine:', error);
      return false;
    }

    if (this.lastStamps && stamps.records === this.lastStamps.records && stamps.catalog === this.lastStamps.catalog) {
      return false;
    }

    this.reloading = true;
    try {
      console.log('🔄 Dataset files changed, rebuilding recommendation engine...');
      const dataset = await this.load(this.paths);
      const active = this.registry.replace(dataset);
      this.lastStamps = stamps;
      const cleared = this.cache ? await this.cache.clearRecommendations() : 0;
      console.log(`✅ Recommendation engine v${active.version} active (${cleared} cached responses dropped)`);
      return true;
    } catch (error) {
      console.error('❌ Dataset reload failed, keeping current engine:', error);
      return false;
    } finally {
      this.reloading = false;
    }
  }

  private async readStamps(): Promise<FileStamps> {
    const [records, catalog] = await Promise.all([
      fs.promises.stat(this.paths.recordsPath),
      fs.promises.stat(this.paths.catalogPath)
    ]);
    return { records: records.mtimeMs, catalog: catalog.mtimeMs };
  }
}
