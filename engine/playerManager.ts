import { Player, PlayerId, Resources, ResourceType, RESOURCE_TYPES } from './types';
import { GameRuleError } from './errors';

export function emptyResources(): Resources {
  return { timber: 0, stone: 0, meat: 0, grain: 0, iron: 0 };
}

export function createPlayer(id: PlayerId, name: string): Player {
  return {
    id,
    name,
    resources: emptyResources(),
    developmentCards: [],
    newDevelopmentCards: [],
    victoryPoints: 0,
    settlements: [],
    cities: [],
    roads: [],
    mustDiscard: 0,
    armySize: 0,
    longestRoadLength: 0
  };
}

export function addResource(player: Player, resource: ResourceType, amount: number = 1): void {
  if (amount < 0) {
    throw new GameRuleError('INVALID_ARGUMENT', 'Amount must be >= 0');
  }
  player.resources[resource] += amount;
}

export function removeResource(player: Player, resource: ResourceType, amount: number = 1): void {
  if (amount < 0) {
    throw new GameRuleError('INVALID_ARGUMENT', 'Amount must be >= 0');
  }
  if (player.resources[resource] < amount) {
    throw new GameRuleError('INSUFFICIENT_RESOURCES', `Not enough ${resource} to remove`);
  }
  player.resources[resource] -= amount;
}

export function hasResources(player: Player, required: Partial<Resources>): boolean {
  return RESOURCE_TYPES.every(resource => player.resources[resource] >= (required[resource] ?? 0));
}

export function spendResources(player: Player, cost: Partial<Resources>): void {
  if (!hasResources(player, cost)) {
    throw new GameRuleError('INSUFFICIENT_RESOURCES', 'Not enough resources to pay the cost');
  }
  for (const resource of RESOURCE_TYPES) {
    player.resources[resource] -= cost[resource] ?? 0;
  }
}

export function addResources(player: Player, resources: Partial<Resources>): void {
  for (const resource of RESOURCE_TYPES) {
    player.resources[resource] += resources[resource] ?? 0;
  }
}

export function getTotalResourceCount(player: Player): number {
  return RESOURCE_TYPES.reduce((sum, resource) => sum + player.resources[resource], 0);
}

/** One entry per card held, in resource-kind order. */
export function getResourceCards(player: Player): ResourceType[] {
  const cards: ResourceType[] = [];
  for (const resource of RESOURCE_TYPES) {
    for (let i = 0; i < player.resources[resource]; i++) {
      cards.push(resource);
    }
  }
  return cards;
}

export function countResources(cards: readonly ResourceType[]): Resources {
  const counts = emptyResources();
  cards.forEach(card => counts[card]++);
  return counts;
}

/**
 * Points a player should hold given the award holders; the engine keeps
 * `player.victoryPoints` equal to this after every command.
 */
export function getVictoryPoints(
  player: Player,
  longestRoadHolder: PlayerId | null,
  largestArmyHolder: PlayerId | null
): number {
  let points = 0;

  points += player.settlements.length;
  points += player.cities.length * 2;
  points += player.developmentCards.filter(card => card === 'victoryPoint').length;

  if (longestRoadHolder === player.id) points += 2;
  if (largestArmyHolder === player.id) points += 2;

  return points;
}
