/**
 * Core data models for the game recommender
 */

export type VertexKind = 'user' | 'item';

export interface InteractionRecord {
  userId: string;
  itemName: string;
  playtime: number; // Minutes played, never negative
  recommend?: boolean;
  review?: string;
}

export interface PlaytimeStats {
  mean: number;
  std: number; // Population standard deviation
}

export interface CatalogEntry {
  itemName: string;
  categories: string[];
}

export interface RecommendationResult {
  rankedItems: string[];
  scores: Map<string, number>; // Every candidate that passed the genre gate
  categories: Map<string, Set<string>>; // Ranked items only
  support: Map<string, number>; // Distinct users behind each candidate
}

export interface RecommendationGraphNode {
  id: string;
  score: number;
  highlight: boolean;
}

export interface RecommendationGraphEdge {
  source: string;
  target: string;
  weight: number;
}

export interface RecommendationGraph {
  nodes: RecommendationGraphNode[];
  edges: RecommendationGraphEdge[];
}

export interface DatasetSummary {
  records: number;
  skipped: number;
  users: number;
  items: number;
  edges: number;
  catalogEntries: number;
}

export interface SearchHistoryEntry {
  id: string;
  likedItem: string;
  topK: number;
  boostFactor: number;
  resultCount: number;
  searchedAt: Date;
}

// JSON shape returned by the recommendations endpoint
export interface RecommendationResponse {
  likedItem: string;
  rankedItems: string[];
  scores: Record<string, number>;
  categories: Record<string, string[]>;
  support: Record<string, number>;
  cached: boolean;
}

// Database row types (snake_case for SQLite)
export interface SearchHistoryRow {
  id: string;
  liked_item: string;
  top_k: number;
  boost_factor: number;
  result_count: number;
  searched_at: string;
}
