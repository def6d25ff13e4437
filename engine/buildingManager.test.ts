import { beforeEach, describe, expect, it } from 'vitest';
import {
  canPlaceRoad, canPlaceSettlement, placeRoadOnBoard, placeSettlementOnBoard, removeRoadFromBoard,
  upgradeSettlementOnBoard
} from './buildingManager';
import { generateBoard } from './boardGenerator';
import { createPlayer } from './playerManager';
import { SeededRandom } from './random';
import { Board, Hex, Player } from './types';
import { catchRuleError } from './testHelpers';

describe('placement rules', () => {
  let board: Board;
  let centre: Hex;
  let alice: Player;
  let bruno: Player;

  beforeEach(() => {
    board = generateBoard(1, new SeededRandom(8));
    const hex = board.hexes.find(h => h.q === 0 && h.r === 0);
    if (!hex) throw new Error('centre hex missing');
    centre = hex;
    alice = createPlayer(0, 'Alice');
    bruno = createPlayer(1, 'Bruno');
  });

  it('enforces the distance rule', () => {
    const [corner0, corner1, corner2] = centre.vertexIds;
    placeSettlementOnBoard(board, alice, corner0);

    expect(canPlaceSettlement(board, corner0, bruno.id)).toBe(false);
    expect(canPlaceSettlement(board, corner1, bruno.id)).toBe(false);
    expect(canPlaceSettlement(board, corner2, bruno.id)).toBe(true);
  });

  it('requires an own road when asked to', () => {
    const [, , corner2, corner3] = centre.vertexIds;
    expect(canPlaceSettlement(board, corner2, alice.id, true)).toBe(false);

    board.edges[centre.edgeIds[2]].owner = alice.id;
    expect(canPlaceSettlement(board, corner2, alice.id, true)).toBe(true);
    expect(canPlaceSettlement(board, corner3, alice.id, true)).toBe(true);
    expect(canPlaceSettlement(board, corner2, bruno.id, true)).toBe(false);
  });

  it('rejects unknown vertices', () => {
    expect(catchRuleError(() => canPlaceSettlement(board, 999, alice.id)).code).toBe('INVALID_TARGET');
  });

  it('connects roads to own buildings or roads', () => {
    const [corner0] = centre.vertexIds;
    const [edge0, edge1, edge2] = centre.edgeIds;

    expect(canPlaceRoad(board, edge0, alice.id)).toBe(false);
    placeSettlementOnBoard(board, alice, corner0);
    expect(canPlaceRoad(board, edge0, alice.id)).toBe(true);

    placeRoadOnBoard(board, alice, edge0);
    expect(canPlaceRoad(board, edge0, alice.id)).toBe(false);
    expect(canPlaceRoad(board, edge1, alice.id)).toBe(true);
    expect(canPlaceRoad(board, edge2, alice.id)).toBe(false);
    expect(canPlaceRoad(board, edge1, bruno.id)).toBe(false);
    expect(alice.roads).toEqual([edge0]);

    removeRoadFromBoard(board, alice, edge0);
    expect(board.edges[edge0].owner).toBeNull();
    expect(alice.roads).toEqual([]);
  });

  it('upgrades only the player\'s own settlement', () => {
    const [corner0, , corner2] = centre.vertexIds;
    placeSettlementOnBoard(board, alice, corner0);

    expect(catchRuleError(() => upgradeSettlementOnBoard(board, bruno, corner0)).code).toBe('ILLEGAL_PLACEMENT');
    expect(catchRuleError(() => upgradeSettlementOnBoard(board, alice, corner2)).code).toBe('ILLEGAL_PLACEMENT');

    upgradeSettlementOnBoard(board, alice, corner0);
    expect(board.vertices[corner0].level).toBe(2);
    expect(alice.settlements).toEqual([]);
    expect(alice.cities).toEqual([corner0]);
    expect(catchRuleError(() => upgradeSettlementOnBoard(board, alice, corner0)).code).toBe('ILLEGAL_PLACEMENT');
  });
});
