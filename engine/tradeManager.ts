import { Board, Player, Port, PortRates, Resources, ResourceType } from './types';
import { GameRuleError } from './errors';
import { addResource, removeResource } from './playerManager';

export const DEFAULT_TRADE_RATE = 4;

export function getPortsForVertex(board: Board, vertexId: number): Port[] {
  return board.ports.filter(port => port.vertexIds.includes(vertexId));
}

/** Best generic and per-resource rates from ports touching the player's buildings. */
export function getPlayerPortRates(player: Player, board: Board): PortRates {
  const rates: PortRates = { generic: DEFAULT_TRADE_RATE, specific: {} };
  const occupied = [...player.settlements, ...player.cities];

  board.ports.forEach(port => {
    if (!port.vertexIds.some(vertexId => occupied.includes(vertexId))) return;

    if (port.resource === null) {
      rates.generic = Math.min(rates.generic, port.rate);
    } else {
      rates.specific[port.resource] = Math.min(rates.specific[port.resource] ?? DEFAULT_TRADE_RATE, port.rate);
    }
  });

  return rates;
}

export function getPlayerTradeRate(player: Player, board: Board, resource: ResourceType): number {
  const rates = getPlayerPortRates(player, board);
  return Math.min(rates.specific[resource] ?? DEFAULT_TRADE_RATE, rates.generic);
}

export interface BankTradeResult {
  gave: ResourceType;
  gaveAmount: number;
  received: ResourceType;
  tradeRate: string;
}

export function tradeWithBank(
  player: Player,
  board: Board,
  bank: Resources,
  givingResource: ResourceType,
  receivingResource: ResourceType,
  rate?: number
): BankTradeResult {
  if (givingResource === receivingResource) {
    throw new GameRuleError('INVALID_TRADE', 'Give and receive resources must differ');
  }

  const bestRate = getPlayerTradeRate(player, board, givingResource);
  const requiredAmount = rate ?? bestRate;

  if (!Number.isInteger(requiredAmount) || requiredAmount <= 0) {
    throw new GameRuleError('INVALID_TRADE', 'Trade rate must be a positive integer');
  }
  if (requiredAmount < bestRate) {
    throw new GameRuleError('INVALID_TRADE', `Trade rate ${requiredAmount}:1 is better than the available ${bestRate}:1`);
  }
  if (player.resources[givingResource] < requiredAmount) {
    throw new GameRuleError(
      'INSUFFICIENT_RESOURCES',
      `Not enough ${givingResource}. Need ${requiredAmount}, have ${player.resources[givingResource]}`
    );
  }
  if (bank[receivingResource] < 1) {
    throw new GameRuleError('INSUFFICIENT_RESOURCES', `Bank does not have any ${receivingResource}`);
  }

  removeResource(player, givingResource, requiredAmount);
  bank[givingResource] += requiredAmount;

  addResource(player, receivingResource, 1);
  bank[receivingResource] -= 1;

  return {
    gave: givingResource,
    gaveAmount: requiredAmount,
    received: receivingResource,
    tradeRate: `${requiredAmount}:1`
  };
}
