import { Router } from 'express';
import { RecommendationController, RecommendationDefaults } from '../controllers/RecommendationController';
import { HistoryController } from '../controllers/HistoryController';
import { EngineRegistry } from '../services/recommendation/EngineRegistry';
import { SearchHistoryService } from '../services/history/SearchHistoryService';
import { CacheRepository } from '../repositories/CacheRepository';

export interface RouteDependencies {
  registry: EngineRegistry;
  cacheRepository: CacheRepository;
  historyService: SearchHistoryService;
  defaults: RecommendationDefaults;
}

/**
 * Initialize and configure all API routes
 */
export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();

  const recommendationController = new RecommendationController(
    deps.registry,
    deps.cacheRepository,
    deps.historyService,
    deps.defaults
  );
  const historyController = new HistoryController(deps.historyService);

  // Recommendation routes
  router.get('/recommendations', recommendationController.getRecommendations.bind(recommendationController));
  router.get('/recommendations/graph', recommendationController.getRecommendationGraph.bind(recommendationController));

  // Catalog routes
  router.get('/games', recommendationController.listGames.bind(recommendationController));
  router.get('/games/:name/categories', recommendationController.getGameCategories.bind(recommendationController));

  // Search history routes
  router.get('/history', historyController.getHistory.bind(historyController));
  router.delete('/history', historyController.clearHistory.bind(historyController));

  return router;
}
