import { Game } from './game';
import { GameRuleError } from './errors';
import { addResources } from './playerManager';
import { PlayerId, Resources, RollResult, RESOURCE_TYPES } from './types';

/** Runs `action` and returns the rule error it throws. */
export function catchRuleError(action: () => unknown): GameRuleError {
  try {
    action();
  } catch (error) {
    if (error instanceof GameRuleError) return error;
    throw error;
  }
  throw new Error('Expected a GameRuleError to be thrown');
}

/** Moves cards from the bank to a player, keeping the totals intact. */
export function grant(game: Game, playerId: PlayerId, resources: Partial<Resources>): void {
  RESOURCE_TYPES.forEach(resource => {
    game.bank[resource] -= resources[resource] ?? 0;
  });
  addResources(game.getPlayer(playerId), resources);
}

/** Rolls for the current player and, on a seven, settles discards and the robber. */
export function rollIntoTrade(game: Game): RollResult {
  const playerId = game.currentPlayer.id;
  const roll = game.rollForTurn(playerId);

  if (game.phase === 'robber') {
    game.players.forEach(player => {
      if (player.mustDiscard > 0) game.autoDiscardForSeven(player.id);
    });
    game.resolveRobberAfterSeven(playerId, game.getRobberTargetHexes()[0]);
  }
  return roll;
}

export function rollIntoBuild(game: Game): RollResult {
  const roll = rollIntoTrade(game);
  game.finishTradePhase(game.currentPlayer.id);
  return roll;
}

export function totalInPlay(game: Game): Resources {
  const totals = { ...game.bank };
  game.players.forEach(player => {
    RESOURCE_TYPES.forEach(resource => {
      totals[resource] += player.resources[resource];
    });
  });
  return totals;
}
