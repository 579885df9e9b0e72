import dotenv from 'dotenv';
import { loadAppConfig } from './config/app';
import { getDatabase, closeDatabase } from './config/database';
import { getRedisClient, closeRedisClient } from './config/redis';
import { runMigrations } from './database/migrations';
import { createApp } from './app';
import { loadDataset, DatasetPaths } from './services/ingestion/DatasetLoader';
import { EngineRegistry } from './services/recommendation/EngineRegistry';
import { DatasetReloadScheduler } from './services/reload/DatasetReloadScheduler';
import { SearchHistoryService } from './services/history/SearchHistoryService';
import { VaderSentimentAnalyzer } from './services/sentiment/SentimentAnalyzer';
import { SearchHistoryRepository } from './repositories/SearchHistoryRepository';
import { CacheRepository } from './repositories/CacheRepository';

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  try {
    console.log('🔧 Initializing services...');
    const config = loadAppConfig();

    console.log('📊 Setting up database...');
    const db = await getDatabase(config.databasePath);
    await runMigrations(db);

    const redis = getRedisClient(config.redisUrl);
    if (redis) {
      try {
        await redis.connect();
      } catch (error) {
        console.error('Failed to connect to Redis, recommendations will not be cached:', error);
      }
    }
    const cacheRepository = new CacheRepository(redis, config.cacheTtlSeconds);
    console.log(`🗄️ Recommendation cache ${cacheRepository.isEnabled ? 'enabled' : 'disabled'}`);

    console.log('🎮 Building recommendation engine...');
    const paths: DatasetPaths = { recordsPath: config.recordsPath, catalogPath: config.catalogPath };
    const sentiment = new VaderSentimentAnalyzer();
    const load = (datasetPaths: DatasetPaths) => loadDataset(datasetPaths, sentiment, config.categoryRootLabel);
    const registry = new EngineRegistry();
    registry.replace(await load(paths));

    const historyService = new SearchHistoryService(new SearchHistoryRepository(db), config.historyLimit);

    const app = createApp({
      registry,
      cacheRepository,
      historyService,
      defaults: { topK: config.defaultTopK, boostFactor: config.defaultBoostFactor },
      frontendUrl: config.frontendUrl
    });

    const server = app.listen(config.port, () => {
      console.log(`🚀 Server running on port ${config.port}`);
      console.log(`🏥 Health check: http://localhost:${config.port}/health`);
      console.log(`🎯 Recommendations: http://localhost:${config.port}/api/recommendations?game=`);
    });

    const scheduler = new DatasetReloadScheduler(paths, registry, load, cacheRepository);
    if (config.reloadCron) {
      await scheduler.markLoaded();
      scheduler.start(config.reloadCron);
    }

    const shutdown = (signal: string) => {
      console.log(`🛑 ${signal} received, shutting down...`);
      scheduler.stop();
      server.close(() => {
        Promise.all([closeDatabase(), closeRedisClient()])
          .then(() => process.exit(0))
          .catch(error => {
            console.error('❌ Error during shutdown:', error);
            process.exit(1);
          });
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
