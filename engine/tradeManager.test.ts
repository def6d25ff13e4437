import { describe, expect, it } from 'vitest';
import { getPlayerPortRates, getPlayerTradeRate, getPortsForVertex, tradeWithBank } from './tradeManager';
import { configurePorts, generateBoard, getCoastalEdges } from './boardGenerator';
import { placeSettlementOnBoard } from './buildingManager';
import { createPlayer, emptyResources } from './playerManager';
import { SeededRandom } from './random';
import { Resources } from './types';
import { catchRuleError } from './testHelpers';

function fullBank(): Resources {
  return { timber: 19, stone: 19, meat: 19, grain: 19, iron: 19 };
}

function portBoard() {
  const board = generateBoard(2, new SeededRandom(42));
  const coastal = getCoastalEdges(board);
  const ironEdge = coastal[0];
  const genericEdge = coastal[15];
  configurePorts(board, [
    { edgeId: ironEdge.id, rate: 2, resource: 'iron' },
    { edgeId: genericEdge.id, rate: 3, resource: null }
  ]);
  return { board, ironEdge, genericEdge };
}

describe('port rates', () => {
  it('defaults to 4:1 without ports', () => {
    const { board } = portBoard();
    const player = createPlayer(0, 'Ash');

    expect(getPlayerPortRates(player, board)).toEqual({ generic: 4, specific: {} });
    expect(getPlayerTradeRate(player, board, 'iron')).toBe(4);
  });

  it('applies ports touching the player\'s buildings', () => {
    const { board, ironEdge, genericEdge } = portBoard();
    const player = createPlayer(0, 'Ash');
    placeSettlementOnBoard(board, player, ironEdge.v1);
    placeSettlementOnBoard(board, player, genericEdge.v2);

    expect(getPortsForVertex(board, ironEdge.v1).map(port => port.resource)).toEqual(['iron']);
    expect(getPlayerPortRates(player, board)).toEqual({ generic: 3, specific: { iron: 2 } });
    expect(getPlayerTradeRate(player, board, 'iron')).toBe(2);
    expect(getPlayerTradeRate(player, board, 'meat')).toBe(3);
  });
});

describe('tradeWithBank', () => {
  it('exchanges at the best available rate', () => {
    const { board } = portBoard();
    const player = createPlayer(0, 'Ash');
    player.resources.timber = 4;
    const bank = fullBank();

    const result = tradeWithBank(player, board, bank, 'timber', 'iron');

    expect(result).toEqual({ gave: 'timber', gaveAmount: 4, received: 'iron', tradeRate: '4:1' });
    expect(player.resources).toEqual({ ...emptyResources(), iron: 1 });
    expect(bank.timber).toBe(23);
    expect(bank.iron).toBe(18);
  });

  it('accepts a worse rate but not a better one', () => {
    const { board } = portBoard();
    const player = createPlayer(0, 'Ash');
    player.resources.meat = 5;

    expect(catchRuleError(() => tradeWithBank(player, board, fullBank(), 'meat', 'grain', 3)).message)
      .toBe('Trade rate 3:1 is better than the available 4:1');
    expect(tradeWithBank(player, board, fullBank(), 'meat', 'grain', 5).gaveAmount).toBe(5);
    expect(player.resources.meat).toBe(0);
  });

  it('rejects same-resource trades and shortfalls', () => {
    const { board } = portBoard();
    const player = createPlayer(0, 'Ash');
    player.resources.stone = 4;
    const emptyIronBank = { ...fullBank(), iron: 0 };

    expect(catchRuleError(() => tradeWithBank(player, board, fullBank(), 'stone', 'stone')).code).toBe('INVALID_TRADE');
    expect(catchRuleError(() => tradeWithBank(player, board, emptyIronBank, 'stone', 'iron')).code)
      .toBe('INSUFFICIENT_RESOURCES');
    expect(catchRuleError(() => tradeWithBank(player, board, fullBank(), 'grain', 'iron')).code)
      .toBe('INSUFFICIENT_RESOURCES');
    expect(catchRuleError(() => tradeWithBank(player, board, fullBank(), 'stone', 'iron', 0)).code)
      .toBe('INVALID_TRADE');
    expect(player.resources.stone).toBe(4);
  });
});
