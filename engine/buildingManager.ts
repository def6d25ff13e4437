import { Board, Edge, Player, PlayerId, Resources, Vertex } from './types';
import { GameRuleError } from './errors';
import { removeOne } from './utils';

export const BUILD_COSTS = {
  road: { timber: 1, stone: 1 },
  settlement: { timber: 1, stone: 1, meat: 1, grain: 1 },
  city: { grain: 2, iron: 3 },
  developmentCard: { meat: 1, grain: 1, iron: 1 }
} as const satisfies Record<string, Partial<Resources>>;

export type BuildCostKey = keyof typeof BUILD_COSTS;

export function isOccupied(vertex: Vertex): boolean {
  return vertex.owner !== null && vertex.level > 0;
}

export function getVertex(board: Board, vertexId: number): Vertex {
  const vertex = board.vertices[vertexId];
  if (!Number.isInteger(vertexId) || !vertex) {
    throw new GameRuleError('INVALID_TARGET', `Unknown vertex ${vertexId}`);
  }
  return vertex;
}

export function getEdge(board: Board, edgeId: number): Edge {
  const edge = board.edges[edgeId];
  if (!Number.isInteger(edgeId) || !edge) {
    throw new GameRuleError('INVALID_TARGET', `Unknown edge ${edgeId}`);
  }
  return edge;
}

/**
 * Distance rule: the vertex and every neighbour must be empty. With
 * `requireConnectedRoad` the player must also own a road touching the vertex.
 */
export function canPlaceSettlement(
  board: Board,
  vertexId: number,
  playerId: PlayerId,
  requireConnectedRoad: boolean = false
): boolean {
  const vertex = getVertex(board, vertexId);
  if (isOccupied(vertex)) return false;

  if (vertex.adjacentVertexIds.some(id => isOccupied(board.vertices[id]))) return false;

  if (!requireConnectedRoad) return true;

  return vertex.adjacentEdgeIds.some(id => board.edges[id].owner === playerId);
}

export function canPlaceRoad(board: Board, edgeId: number, playerId: PlayerId): boolean {
  const edge = getEdge(board, edgeId);
  if (edge.owner !== null) return false;

  const endpoints = [board.vertices[edge.v1], board.vertices[edge.v2]];

  if (endpoints.some(v => isOccupied(v) && v.owner === playerId)) return true;

  return endpoints.some(v =>
    v.adjacentEdgeIds.some(id => id !== edgeId && board.edges[id].owner === playerId)
  );
}

export function placeSettlementOnBoard(board: Board, player: Player, vertexId: number): void {
  const vertex = getVertex(board, vertexId);
  vertex.owner = player.id;
  vertex.level = 1;
  player.settlements.push(vertexId);
}

export function upgradeSettlementOnBoard(board: Board, player: Player, vertexId: number): void {
  const vertex = getVertex(board, vertexId);
  if (vertex.owner !== player.id || vertex.level !== 1) {
    throw new GameRuleError('ILLEGAL_PLACEMENT', 'Player must own a settlement on this vertex to upgrade');
  }

  vertex.level = 2;
  removeOne(player.settlements, vertexId);
  player.cities.push(vertexId);
}

export function placeRoadOnBoard(board: Board, player: Player, edgeId: number): void {
  const edge = getEdge(board, edgeId);
  edge.owner = player.id;
  player.roads.push(edgeId);
}

export function removeRoadFromBoard(board: Board, player: Player, edgeId: number): void {
  const edge = getEdge(board, edgeId);
  edge.owner = null;
  removeOne(player.roads, edgeId);
}
