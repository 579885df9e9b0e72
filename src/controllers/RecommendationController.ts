import { Request, Response } from 'express';
import { ObjectSchema } from 'joi';
import { EngineRegistry } from '../services/recommendation/EngineRegistry';
import { buildRecommendationGraph } from '../services/recommendation/RecommendationGraphBuilder';
import { SearchHistoryService } from '../services/history/SearchHistoryService';
import { CacheRepository } from '../repositories/CacheRepository';
import {
  createRecommendationQuerySchema, gamesQuerySchema, validateQuery,
  RecommendationQuery, ValidationError
} from '../models/validation';
import { recommendationResultToResponse, categorySetToArray } from '../models/transformers';
import { RecommendationResponse } from '../types/models';

export interface RecommendationDefaults {
  topK: number;
  boostFactor: number;
}

/**
 * RecommendationController handles HTTP requests for recommendations and the game catalog
 */
export class RecommendationController {
  private readonly querySchema: ObjectSchema<RecommendationQuery>;

  constructor(
    private registry: EngineRegistry,
    private cacheRepository: CacheRepository,
    private historyService: SearchHistoryService,
    defaults: RecommendationDefaults
  ) {
    this.querySchema = createRecommendationQuerySchema(defaults);
  }

  /**
   * GET /api/recommendations - Ranked games similar to the liked one
   */
  async getRecommendations(req: Request, res: Response): Promise<void> {
    try {
      const query = validateQuery(this.querySchema, req.query);
      const active = this.registry.current();
      const cacheKey = {
        datasetVersion: active.version,
        likedItem: query.game,
        topK: query.topK,
        boostFactor: query.boost
      };

      let response: RecommendationResponse;
      const cached = await this.cacheRepository.getCachedRecommendation(cacheKey);
      if (cached) {
        response = { ...cached, cached: true };
      } else {
        const result = active.engine.recommend(query.game, query.topK, query.boost);
        response = recommendationResultToResponse(query.game, result);
        await this.cacheRepository.cacheRecommendation(cacheKey, response);
      }

      await this.recordSearch(query, response.rankedItems.length);
      res.json(response);
    } catch (error) {
      this.handleError(res, error, 'Failed to generate recommendations');
    }
  }

  /**
   * GET /api/recommendations/graph - Liked game and its recommendations as nodes and edges
   */
  async getRecommendationGraph(req: Request, res: Response): Promise<void> {
    try {
      const query = validateQuery(this.querySchema, req.query);
      const { engine } = this.registry.current();
      const result = engine.recommend(query.game, query.topK, query.boost);
      res.json(buildRecommendationGraph(query.game, result));
    } catch (error) {
      this.handleError(res, error, 'Failed to build recommendation graph');
    }
  }

  /**
   * GET /api/games - Game names known to the genre tree
   */
  async listGames(req: Request, res: Response): Promise<void> {
    try {
      const query = validateQuery(gamesQuerySchema, req.query);
      const { tree } = this.registry.current();
      const needle = query.q?.toLowerCase();
      const matches = needle
        ? tree.allItemNames().filter(name => name.toLowerCase().includes(needle))
        : tree.allItemNames();

      res.json({
        games: matches.slice(0, query.limit),
        total: matches.length
      });
    } catch (error) {
      this.handleError(res, error, 'Failed to list games');
    }
  }

  /**
   * GET /api/games/:name/categories - Genres of one game
   */
  async getGameCategories(req: Request, res: Response): Promise<void> {
    try {
      const name = req.params.name;
      const { tree } = this.registry.current();
      const categories = tree.categoryIndex().get(name);

      if (!categories || categories.size === 0) {
        res.status(404).json({
          error: 'Game not found',
          message: `No categories known for "${name}"`
        });
        return;
      }

      res.json({ item: name, categories: categorySetToArray(categories) });
    } catch (error) {
      this.handleError(res, error, 'Failed to get game categories');
    }
  }

  private async recordSearch(query: RecommendationQuery, resultCount: number): Promise<void> {
    try {
      await this.historyService.record(query.game, query.topK, query.boost, resultCount);
    } catch (error) {
      console.error('❌ Failed to record search history:', error);
    }
  }

  private handleError(res: Response, error: unknown, message: string): void {
    if (error instanceof ValidationError) {
      res.status(400).json({
        error: 'Invalid query',
        details: error.details.map(detail => detail.message)
      });
      return;
    }
    console.error(`❌ ${message}:`, error);
    res.status(500).json({
      error: 'Internal server error',
      message
    });
  }
}
