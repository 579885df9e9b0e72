import { Request, Response } from 'express';
import { SearchHistoryService } from '../services/history/SearchHistoryService';
import { historyQuerySchema, validateQuery, ValidationError } from '../models/validation';

/**
 * HistoryController exposes past recommendation searches
 */
export class HistoryController {
  constructor(private historyService: SearchHistoryService) {}

  /**
   * GET /api/history - Most recent searches first
   */
  async getHistory(req: Request, res: Response): Promise<void> {
    try {
      const { limit } = validateQuery(historyQuerySchema, req.query);
      const entries = await this.historyService.recent(limit);
      res.json({
        history: entries.map(entry => ({
          ...entry,
          searchedAt: entry.searchedAt.toISOString()
        }))
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({
          error: 'Invalid query',
          details: error.details.map(detail => detail.message)
        });
        return;
      }
      console.error('❌ Failed to get search history:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to retrieve search history'
      });
    }
  }

  /**
   * DELETE /api/history - Forget every recorded search
   */
  async clearHistory(req: Request, res: Response): Promise<void> {
    try {
      const deleted = await this.historyService.clear();
      res.json({ message: 'Search history cleared', deleted });
    } catch (error) {
      console.error('❌ Failed to clear search history:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to clear search history'
      });
    }
  }
}
