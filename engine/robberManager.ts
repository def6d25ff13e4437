import { Board, Player, PlayerId, Resources, ResourceType, RESOURCE_TYPES } from './types';
import { SeededRandom } from './random';
import { GameRuleError } from './errors';
import { addResource, getResourceCards, getTotalResourceCount, removeResource } from './playerManager';

export const DISCARD_THRESHOLD = 7;

/** Marks every player holding more than seven cards with a discard of half, rounded down. */
export function handleRobber(players: Player[]): void {
  players.forEach(player => {
    const totalCards = getTotalResourceCount(player);
    player.mustDiscard = totalCards > DISCARD_THRESHOLD ? Math.floor(totalCards / 2) : 0;
  });
}

export function checkAllDiscarded(players: Player[]): boolean {
  return players.every(player => player.mustDiscard === 0);
}

/**
 * Returns exactly the owed number of cards from `player` to the bank.
 * Nothing moves unless the whole selection is valid.
 */
export function discardCards(player: Player, bank: Resources, cardsToDiscard: Partial<Resources>): void {
  if (player.mustDiscard === 0) {
    throw new GameRuleError('INVALID_DISCARD', 'Player has no pending discard requirement');
  }

  const totalDiscarded = RESOURCE_TYPES.reduce((sum, resource) => sum + (cardsToDiscard[resource] ?? 0), 0);
  if (totalDiscarded !== player.mustDiscard) {
    throw new GameRuleError('INVALID_DISCARD', `Player must discard exactly ${player.mustDiscard} cards`);
  }

  for (const resource of RESOURCE_TYPES) {
    if (player.resources[resource] < (cardsToDiscard[resource] ?? 0)) {
      throw new GameRuleError('INVALID_DISCARD', `Player lacks enough ${resource} to discard`);
    }
  }

  for (const resource of RESOURCE_TYPES) {
    const amount = cardsToDiscard[resource] ?? 0;
    removeResource(player, resource, amount);
    bank[resource] += amount;
  }

  player.mustDiscard = 0;
}

/** Uniform sample, without replacement, of the cards a player owes. */
export function pickAutoDiscard(player: Player, rng: SeededRandom): ResourceType[] {
  const pool = getResourceCards(player);
  if (pool.length < player.mustDiscard) {
    throw new GameRuleError('INVALID_DISCARD', 'Not enough resources available to discard');
  }
  return rng.sample(pool, player.mustDiscard);
}

/** Other players with a building on the hex and at least one card, in corner order. */
export function getEligibleVictims(
  board: Board,
  players: Player[],
  actingPlayerId: PlayerId,
  targetHexId: number
): PlayerId[] {
  const hex = board.hexes[targetHexId];
  if (!Number.isInteger(targetHexId) || !hex) {
    throw new GameRuleError('INVALID_TARGET', 'Invalid target hex');
  }

  const eligible: PlayerId[] = [];
  hex.vertexIds.forEach(vertexId => {
    const owner = board.vertices[vertexId].owner;
    if (owner === null || owner === actingPlayerId || eligible.includes(owner)) return;
    if (getTotalResourceCount(players[owner]) <= 0) return;
    eligible.push(owner);
  });
  return eligible;
}

/** Moves one uniformly drawn card from the victim to the robber. */
export function stealCard(robber: Player, victim: Player, rng: SeededRandom): ResourceType | null {
  const availableResources = getResourceCards(victim);
  if (availableResources.length === 0) return null;

  const stolenResource = rng.choice(availableResources);
  removeResource(victim, stolenResource, 1);
  addResource(robber, stolenResource, 1);
  return stolenResource;
}
