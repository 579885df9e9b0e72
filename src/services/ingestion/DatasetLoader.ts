import { DatasetSummary } from '../../types/models';
import { InteractionGraph, buildInteractionGraph } from '../recommendation/InteractionGraph';
import { CategoryTree, buildCategoryTree, DEFAULT_ROOT_LABEL } from '../recommendation/CategoryTree';
import { computePlaytimeStats } from '../recommendation/WeightModel';
import { SentimentAnalyzer } from '../sentiment/SentimentAnalyzer';
import { readRecords } from './RecordLoader';
import { readCatalog } from './CatalogLoader';

export interface DatasetPaths {
  recordsPath: string;
  catalogPath: string;
}

export interface LoadedDataset {
  graph: InteractionGraph;
  tree: CategoryTree;
  summary: DatasetSummary;
}

/**
 * Build the interaction graph and genre tree from the files on disk.
 * Playtime statistics are collected in a first pass, weights assigned in a second.
 */
export async function loadDataset(
  paths: DatasetPaths,
  sentiment?: SentimentAnalyzer,
  rootLabel: string = DEFAULT_ROOT_LABEL
): Promise<LoadedDataset> {
  const startTime = Date.now();

  const { records, unparsable } = await readRecords(paths.recordsPath);
  const stats = computePlaytimeStats(records);
  const { graph, processed, skipped } = buildInteractionGraph(records, stats, sentiment);

  const catalog = await readCatalog(paths.catalogPath);
  const tree = buildCategoryTree(catalog, rootLabel);

  const summary: DatasetSummary = {
    records: processed,
    skipped: skipped + unparsable,
    users: graph.vertexCount('user'),
    items: graph.vertexCount('item'),
    edges: graph.edgeCount(),
    catalogEntries: catalog.length
  };

  console.log(`📦 Dataset loaded in ${Date.now() - startTime}ms:`, summary);
  return { graph, tree, summary };
}
