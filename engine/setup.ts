import { InitialPlacement, PlayerId, Resources } from './types';
import type { Game } from './game';
import { GameRuleError } from './errors';
import { addResource, emptyResources } from './playerManager';
import { canPlaceRoad, canPlaceSettlement } from './buildingManager';
import { getPortsForVertex } from './tradeManager';

export interface AutoSetupOptions {
  preferPorts?: boolean;
}

/** Snake order: the turn order forwards, then backwards. */
export function initialPlacementOrder(turnOrder: readonly PlayerId[]): PlayerId[] {
  return [...turnOrder, ...[...turnOrder].reverse()];
}

/** One card per productive hex touching the vertex, while the bank has it. */
export function grantStartingResources(game: Game, playerId: PlayerId, vertexId: number): Resources {
  const player = game.getPlayer(playerId);
  const payout = emptyResources();

  game.board.vertices[vertexId].hexIds.forEach(hexId => {
    const resource = game.board.hexes[hexId].terrain;
    if (resource === 'wasteland' || game.bank[resource] <= 0) return;

    game.bank[resource] -= 1;
    addResource(player, resource, 1);
    payout[resource] += 1;
  });

  return payout;
}

/**
 * Completes the snake-order initial placement from wherever it stands, taking
 * the lowest legal vertex (port vertices first when `preferPorts`) and the
 * first legal road beside it. Each second settlement pays starting resources.
 */
export function autoInitialSetup(game: Game, options: AutoSetupOptions = {}): InitialPlacement[] {
  if (!game.isInitialPlacementOpen()) {
    throw new GameRuleError('WRONG_PHASE', 'Initial placements are only allowed before the first roll');
  }

  const preferPorts = options.preferPorts ?? true;
  const placements: InitialPlacement[] = [];

  let candidates = game.board.vertices.map(vertex => vertex.id);
  if (preferPorts) {
    const withPorts = candidates.filter(vertexId => getPortsForVertex(game.board, vertexId).length > 0);
    candidates = [...withPorts, ...candidates.filter(vertexId => !withPorts.includes(vertexId))];
  }

  for (let playerId = game.getInitialPlacementPlayer(); playerId !== null; playerId = game.getInitialPlacementPlayer()) {
    const placingPlayer = playerId;
    const second = game.isSecondInitialPlacement();

    let settlementVertexId = game.getPendingInitialSettlement();
    if (settlementVertexId === null) {
      settlementVertexId = candidates.find(vertexId => canPlaceSettlement(game.board, vertexId, placingPlayer)) ?? null;
      if (settlementVertexId === null) {
        throw new GameRuleError('ILLEGAL_PLACEMENT', `No legal initial settlement for player ${placingPlayer}`);
      }
      game.placeInitialSettlement(placingPlayer, settlementVertexId);
    }

    const roadEdgeId = game.board.vertices[settlementVertexId].adjacentEdgeIds
      .find(edgeId => canPlaceRoad(game.board, edgeId, placingPlayer));
    if (roadEdgeId === undefined) {
      throw new GameRuleError('ILLEGAL_PLACEMENT', `No legal initial road for player ${placingPlayer}`);
    }
    game.placeInitialRoad(placingPlayer, roadEdgeId);

    placements.push({
      playerId: placingPlayer,
      settlementVertexId,
      roadEdgeId,
      startingResources: second
        ? grantStartingResources(game, placingPlayer, settlementVertexId)
        : emptyResources()
    });
  }

  return placements;
}
