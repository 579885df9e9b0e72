import { RecommendationResult } from '../../types/models';
import { InteractionGraph } from './InteractionGraph';
import { CategoryTree } from './CategoryTree';

/**
 * Raised when the engine is assembled without its graph or taxonomy
 */
export class EngineWiringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineWiringError';
  }
}

// Per-request genre lookups; callers may share one across requests on the same tree
export type CategoryLookupCache = Map<string, Set<string>>;

interface CandidateScore {
  rawScore: number;
  supportCount: number;
}

const NO_CATEGORIES: ReadonlySet<string> = new Set();

/**
 * Genre-aware item-to-item recommendations over the user-game interaction graph
 */
export class RecommendationEngine {
  constructor(private readonly graph: InteractionGraph, private readonly tree: CategoryTree) {
    if (!graph || !tree) {
      throw new EngineWiringError('RecommendationEngine requires both an interaction graph and a category tree');
    }
  }

  /**
   * Rank games co-played with `likedItem` that share at least one genre with it.
   * Scores are summed edge weights divided by log(1 + supporting users), times `boostFactor`.
   */
  recommend(
    likedItem: string,
    topK: number,
    boostFactor: number,
    cache: CategoryLookupCache = new Map()
  ): RecommendationResult {
    const vertex = this.graph.getVertex(likedItem);
    if (!vertex || vertex.kind !== 'item') {
      return emptyResult();
    }

    const likedCategories = this.lookupCategories(likedItem, cache);
    if (likedCategories.size === 0) {
      return emptyResult();
    }

    const candidates = new Map<string, CandidateScore>();
    for (const user of this.graph.neighborsOfKind(likedItem, 'user')) {
      for (const [game, weight] of user.neighbours) {
        if (game.kind !== 'item' || game.id === likedItem) continue;

        const gameCategories = this.lookupCategories(game.id, cache);
        if (!intersects(likedCategories, gameCategories)) continue;

        const candidate = candidates.get(game.id);
        if (candidate) {
          candidate.rawScore += weight;
          candidate.supportCount += 1;
        } else {
          candidates.set(game.id, { rawScore: weight, supportCount: 1 });
        }
      }
    }

    const scores = new Map<string, number>();
    const support = new Map<string, number>();
    for (const [game, { rawScore, supportCount }] of candidates) {
      scores.set(game, (rawScore / Math.log(1 + supportCount)) * boostFactor);
      support.set(game, supportCount);
    }

    // Array.prototype.sort is stable, so equal scores keep first-encounter order
    const ranked = Array.from(scores.entries()).sort((a, b) => b[1] - a[1]);
    const rankedItems = topK > 0 ? ranked.slice(0, topK).map(([game]) => game) : [];

    const categories = new Map<string, Set<string>>();
    for (const game of rankedItems) {
      categories.set(game, new Set(this.lookupCategories(game, cache)));
    }

    return { rankedItems, scores, categories, support };
  }

  private lookupCategories(item: string, cache: CategoryLookupCache): ReadonlySet<string> {
    const cached = cache.get(item);
    if (cached) return cached;
    const categories = this.tree.categoryIndex().get(item);
    if (!categories) return NO_CATEGORIES;
    cache.set(item, categories);
    return categories;
  }
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  for (const label of smaller) {
    if (larger.has(label)) return true;
  }
  return false;
}

function emptyResult(): RecommendationResult {
  return { rankedItems: [], scores: new Map(), categories: new Map(), support: new Map() };
}
