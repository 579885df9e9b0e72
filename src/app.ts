import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createRoutes, RouteDependencies } from './routes';

export interface AppOptions extends RouteDependencies {
  frontendUrl?: string;
}

/**
 * Assemble the Express application around an already-loaded engine registry
 */
export function createApp(options: AppOptions): express.Application {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: options.frontendUrl || ['http://localhost:3000', 'http://localhost:3005']
  }));
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    const loaded = options.registry.isLoaded();
    const active = loaded ? options.registry.current() : null;
    res.json({
      status: loaded ? 'ok' : 'loading',
      timestamp: new Date().toISOString(),
      service: 'game-recommender-api',
      version: '1.0.0',
      dataset: active
        ? { version: active.version, loadedAt: active.loadedAt.toISOString(), ...active.summary }
        : null
    });
  });

  app.use('/api', createRoutes(options));

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableRoutes: {
        health: 'GET /health',
        recommendations: 'GET /api/recommendations?game=',
        graph: 'GET /api/recommendations/graph?game=',
        games: 'GET /api/games',
        categories: 'GET /api/games/:name/categories',
        history: 'GET|DELETE /api/history'
      }
    });
  });

  // Error handler
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('❌ Unhandled error:', error);
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred'
    });
  });

  return app;
}
