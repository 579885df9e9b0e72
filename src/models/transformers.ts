import {
  InteractionRecord, CatalogEntry, SearchHistoryEntry, SearchHistoryRow,
  RecommendationResult, RecommendationResponse
} from '../types/models';
import type { RawInteractionRecord, RawCatalogEntry } from './validation';

/**
 * Transformation functions between wire/database shapes and model objects
 */

// Classifier placeholders for "no genre found"
const CATEGORY_SENTINELS = new Set(['Unknown', 'Error']);

export function normalizeCategoryLabels(categories: string[] | string): string[] {
  const labels = Array.isArray(categories) ? categories : categories.split(',');
  const seen = new Set<string>();
  for (const label of labels) {
    const trimmed = label.trim();
    if (trimmed && !CATEGORY_SENTINELS.has(trimmed)) {
      seen.add(trimmed);
    }
  }
  return Array.from(seen);
}

// Dataset transformations
export function rawRecordToModel(raw: RawInteractionRecord): InteractionRecord {
  const record: InteractionRecord = {
    userId: raw.user_id,
    itemName: raw.item_name,
    playtime: raw.playtime
  };
  if (typeof raw.recommend === 'boolean') {
    record.recommend = raw.recommend;
  }
  if (typeof raw.review === 'string') {
    record.review = raw.review;
  }
  return record;
}

export function rawCatalogEntryToModel(raw: RawCatalogEntry): CatalogEntry {
  return {
    itemName: raw.item_name,
    categories: normalizeCategoryLabels(raw.categories)
  };
}

// Search history transformations
export function searchHistoryRowToModel(row: SearchHistoryRow): SearchHistoryEntry {
  return {
    id: row.id,
    likedItem: row.liked_item,
    topK: row.top_k,
    boostFactor: row.boost_factor,
    resultCount: row.result_count,
    searchedAt: new Date(row.searched_at)
  };
}

export function searchHistoryModelToRow(entry: SearchHistoryEntry): SearchHistoryRow {
  return {
    id: entry.id,
    liked_item: entry.likedItem,
    top_k: entry.topK,
    boost_factor: entry.boostFactor,
    result_count: entry.resultCount,
    searched_at: entry.searchedAt.toISOString()
  };
}

// Recommendation transformations
export function mapToRecord<V, R>(map: Map<string, V>, convert: (value: V) => R): Record<string, R> {
  const record: Record<string, R> = {};
  for (const [key, value] of map) {
    record[key] = convert(value);
  }
  return record;
}

export function categorySetToArray(categories: Set<string>): string[] {
  return Array.from(categories).sort();
}

export function recommendationResultToResponse(
  likedItem: string,
  result: RecommendationResult,
  cached: boolean = false
): RecommendationResponse {
  return {
    likedItem,
    rankedItems: [...result.rankedItems],
    scores: mapToRecord(result.scores, score => score),
    categories: mapToRecord(result.categories, categorySetToArray),
    support: mapToRecord(result.support, count => count),
    cached
  };
}
