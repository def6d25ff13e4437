import { DevelopmentCardType, Player, Resources, ResourceType } from './types';
import { SeededRandom } from './random';
import { GameRuleError } from './errors';
import { addResource, removeResource } from './playerManager';

export const DEVELOPMENT_CARD_TYPES: readonly DevelopmentCardType[] = [
  'knight', 'victoryPoint', 'roadBuilding', 'yearOfPlenty', 'monopoly'
];

export const DEVELOPMENT_CARD_COUNTS: Record<DevelopmentCardType, number> = {
  knight: 14,
  victoryPoint: 5,
  roadBuilding: 2,
  yearOfPlenty: 2,
  monopoly: 2
};

/** The draw pile. Index 0 is the next card drawn. */
export class DevelopmentCardManager {
  private deck: DevelopmentCardType[] = [];

  initialize(rng: SeededRandom): void {
    const cards: DevelopmentCardType[] = [];
    for (const cardType of DEVELOPMENT_CARD_TYPES) {
      for (let i = 0; i < DEVELOPMENT_CARD_COUNTS[cardType]; i++) {
        cards.push(cardType);
      }
    }

    this.deck = rng.shuffle(cards);
  }

  draw(): DevelopmentCardType {
    const card = this.deck.shift();
    if (card === undefined) {
      throw new GameRuleError('EMPTY_DECK', 'No development cards remain in the deck');
    }
    return card;
  }

  getDeck(): DevelopmentCardType[] {
    return [...this.deck];
  }

  setDeck(deck: DevelopmentCardType[]): void {
    this.deck = [...deck];
  }

  getDeckSize(): number {
    return this.deck.length;
  }
}

/** Held copies of `card` minus the copies bought this turn. */
export function countPlayable(player: Player, card: DevelopmentCardType): number {
  const held = player.developmentCards.filter(c => c === card).length;
  const fresh = player.newDevelopmentCards.filter(c => c === card).length;
  return held - fresh;
}

/**
 * Grants one of each requested resource from the bank, or nothing at all.
 */
export function playYearOfPlenty(player: Player, bank: Resources, resources: ResourceType[]): ResourceType[] {
  const granted: ResourceType[] = [];

  try {
    for (const resource of resources) {
      if (bank[resource] < 1) {
        throw new GameRuleError('INSUFFICIENT_RESOURCES', `Bank has no ${resource} available`);
      }
      bank[resource] -= 1;
      addResource(player, resource, 1);
      granted.push(resource);
    }
  } catch (error) {
    for (const resource of granted) {
      removeResource(player, resource, 1);
      bank[resource] += 1;
    }
    throw error;
  }

  return granted;
}

export function playMonopoly(player: Player, resource: ResourceType, allPlayers: Player[]): number {
  let totalTaken = 0;
  allPlayers.forEach(otherPlayer => {
    if (otherPlayer.id === player.id) return;

    const amount = otherPlayer.resources[resource];
    if (amount > 0) {
      removeResource(otherPlayer, resource, amount);
      addResource(player, resource, amount);
      totalTaken += amount;
    }
  });
  return totalTaken;
}
