import { DatasetSummary } from '../../types/models';
import { LoadedDataset } from '../ingestion/DatasetLoader';
import { CategoryTree } from './CategoryTree';
import { RecommendationEngine, EngineWiringError } from './RecommendationEngine';

export interface ActiveEngine {
  engine: RecommendationEngine;
  tree: CategoryTree;
  version: number;
  loadedAt: Date;
  summary: DatasetSummary;
}

/**
 * Holds the engine currently serving requests. A reload swaps in a complete new
 * engine; requests already running keep the one they started with.
 */
export class EngineRegistry {
  private active: ActiveEngine | null = null;
  private version = 0;

  replace(dataset: LoadedDataset): ActiveEngine {
    const engine = new RecommendationEngine(dataset.graph, dataset.tree);
    this.version++;
    this.active = {
      engine,
      tree: dataset.tree,
      version: this.version,
      loadedAt: new Date(),
      summary: dataset.summary
    };
    return this.active;
  }

  current(): ActiveEngine {
    if (!this.active) {
      throw new EngineWiringError('No dataset has been loaded yet');
    }
    return this.active;
  }

  isLoaded(): boolean {
    return this.active !== null;
  }
}
