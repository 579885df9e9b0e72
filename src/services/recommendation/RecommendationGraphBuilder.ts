import { RecommendationGraph, RecommendationResult } from '../../types/models';

/**
 * Star graph of the liked game and its ranked recommendations, for display
 */
export function buildRecommendationGraph(likedItem: string, result: RecommendationResult): RecommendationGraph {
  if (result.rankedItems.length === 0) {
    return { nodes: [], edges: [] };
  }

  const graph: RecommendationGraph = {
    nodes: [{ id: likedItem, score: 0, highlight: true }],
    edges: []
  };

  for (const game of result.rankedItems) {
    const score = result.scores.get(game) ?? 0;
    graph.nodes.push({ id: game, score, highlight: false });
    graph.edges.push({ source: likedItem, target: game, weight: score });
  }

  return graph;
}
