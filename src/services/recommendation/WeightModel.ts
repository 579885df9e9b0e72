import { PlaytimeStats } from '../../types/models';
import { validateInteractionRecord } from '../../models/validation';
import { SentimentAnalyzer } from '../sentiment/SentimentAnalyzer';

export interface WeightInput {
  playtime: number;
  mean: number;
  std: number;
  recommend?: boolean;
  review?: string;
}

export const PLAYTIME_WEIGHT = 0.5;
export const RECOMMEND_BONUS = 2.0;
export const NOT_RECOMMEND_PENALTY = -0.5;

/**
 * Synthesize a user-game edge weight from playtime, the recommend flag and review sentiment.
 * Playtime is z-scored against the game's own population; the result is clamped at zero.
 */
export function computeEdgeWeight(input: WeightInput, sentiment?: SentimentAnalyzer): number {
  const zScore = input.std === 0 ? 0 : (input.playtime - input.mean) / input.std;
  const playtimeScore = PLAYTIME_WEIGHT * zScore;

  let recommendScore = 0;
  if (input.recommend === true) {
    recommendScore = RECOMMEND_BONUS;
  } else if (input.recommend === false) {
    recommendScore = NOT_RECOMMEND_PENALTY;
  }

  let sentimentScore = 0;
  if (sentiment && input.review) {
    sentimentScore = sentiment.score(input.review);
  }

  return Math.max(playtimeScore + recommendScore + sentimentScore, 0);
}

/**
 * Mean and population standard deviation of playtime per game.
 * Must run over the whole stream before any weight is assigned.
 */
export function computePlaytimeStats(records: Iterable<unknown>): Map<string, PlaytimeStats> {
  const playtimes = new Map<string, number[]>();

  for (const raw of records) {
    const { value } = validateInteractionRecord(raw);
    if (!value) continue;
    const times = playtimes.get(value.itemName);
    if (times) {
      times.push(value.playtime);
    } else {
      playtimes.set(value.itemName, [value.playtime]);
    }
  }

  const stats = new Map<string, PlaytimeStats>();
  for (const [item, times] of playtimes) {
    const mean = times.reduce((sum, t) => sum + t, 0) / times.length;
    const variance = times.reduce((sum, t) => sum + (t - mean) ** 2, 0) / times.length;
    stats.set(item, { mean, std: Math.sqrt(variance) });
  }
  return stats;
}
