import { Board, PlayerId } from './types';
import { isOccupied } from './buildingManager';

export const LONGEST_ROAD_MINIMUM = 5;
export const LARGEST_ARMY_MINIMUM = 3;

/**
 * Length of the player's longest simple road path. Every owned road is tried
 * from both endpoints with a fresh per-path edge set; nothing is memoised
 * between starts or between calls, so results depend only on the current board.
 * A vertex holding another player's building ends a path there.
 */
export function findLongestRoad(board: Board, playerId: PlayerId, roads: readonly number[]): number {
  if (roads.length === 0) return 0;

  let best = 0;
  for (const edgeId of roads) {
    const edge = board.edges[edgeId];
    const used = new Set<number>([edgeId]);
    best = Math.max(best, walk(board, playerId, edge.v1, used));
    best = Math.max(best, walk(board, playerId, edge.v2, used));
  }
  return best;
}

function walk(board: Board, playerId: PlayerId, vertexId: number, used: Set<number>): number {
  let best = used.size;

  const vertex = board.vertices[vertexId];
  if (isOccupied(vertex) && vertex.owner !== playerId) {
    return best;
  }

  for (const edgeId of vertex.adjacentEdgeIds) {
    if (used.has(edgeId)) continue;

    const edge = board.edges[edgeId];
    if (edge.owner !== playerId) continue;

    const nextVertex = edge.v1 === vertexId ? edge.v2 : edge.v1;
    used.add(edgeId);
    best = Math.max(best, walk(board, playerId, nextVertex, used));
    used.delete(edgeId);
  }

  return best;
}

/**
 * Sticky award election. The single best contender at or above `minimum`
 * wins; on a tie for best the incumbent keeps the award if tied, otherwise
 * nobody holds it.
 */
export function electHolder(
  values: ReadonlyMap<PlayerId, number>,
  incumbent: PlayerId | null,
  minimum: number
): PlayerId | null {
  let bestValue = 0;
  for (const value of values.values()) {
    bestValue = Math.max(bestValue, value);
  }
  if (bestValue < minimum) return null;

  const contenders = Array.from(values.entries())
    .filter(([, value]) => value === bestValue)
    .map(([playerId]) => playerId);

  if (contenders.length === 1) return contenders[0];
  if (incumbent !== null && contenders.includes(incumbent)) return incumbent;
  return null;
}
