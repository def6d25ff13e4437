import { describe, expect, it } from 'vitest';
import { configurePorts, generateBoard, getCoastalEdges, getHexCoordinates } from './boardGenerator';
import { SeededRandom } from './random';
import { Board } from './types';
import { catchRuleError } from './testHelpers';

function standardBoard(seed = 42): Board {
  return generateBoard(2, new SeededRandom(seed));
}

function centreHex(board: Board) {
  const hex = board.hexes.find(h => h.q === 0 && h.r === 0);
  if (!hex) throw new Error('centre hex missing');
  return hex;
}

describe('generateBoard', () => {
  it('builds the standard radius-2 topology', () => {
    const board = standardBoard();

    expect(board.hexes).toHaveLength(19);
    expect(board.vertices).toHaveLength(54);
    expect(board.edges).toHaveLength(72);
    expect(getCoastalEdges(board)).toHaveLength(30);
  });

  it('builds a radius-1 board with generic ports only', () => {
    const board = generateBoard(1, new SeededRandom(5));

    expect(board.hexes).toHaveLength(7);
    expect(board.vertices).toHaveLength(24);
    expect(board.edges).toHaveLength(30);
    expect(getCoastalEdges(board)).toHaveLength(18);
    expect(board.ports).toHaveLength(6);
    expect(board.ports.every(port => port.rate === 3 && port.resource === null)).toBe(true);
    expect(board.hexes.filter(hex => hex.terrain === 'wasteland')).toHaveLength(1);
  });

  it('enumerates hex coordinates q-major', () => {
    expect(getHexCoordinates(1)).toEqual([
      { q: -1, r: 0 }, { q: -1, r: 1 },
      { q: 0, r: -1 }, { q: 0, r: 0 }, { q: 0, r: 1 },
      { q: 1, r: -1 }, { q: 1, r: 0 }
    ]);
  });

  it('stores every entity at the index of its id', () => {
    const board = standardBoard();
    board.hexes.forEach((hex, index) => expect(hex.id).toBe(index));
    board.vertices.forEach((vertex, index) => expect(vertex.id).toBe(index));
    board.edges.forEach((edge, index) => expect(edge.id).toBe(index));
  });

  it('links vertices and edges symmetrically', () => {
    const board = standardBoard();

    board.vertices.forEach(vertex => {
      expect([2, 3]).toContain(vertex.adjacentVertexIds.length);
      expect(vertex.adjacentEdgeIds).toHaveLength(vertex.adjacentVertexIds.length);
      vertex.adjacentVertexIds.forEach(otherId => {
        expect(board.vertices[otherId].adjacentVertexIds).toContain(vertex.id);
      });
    });

    board.edges.forEach(edge => {
      expect(edge.v1).toBeLessThan(edge.v2);
      expect(board.vertices[edge.v1].adjacentEdgeIds).toContain(edge.id);
      expect(board.vertices[edge.v2].adjacentEdgeIds).toContain(edge.id);
      expect([1, 2]).toContain(edge.hexIds.length);
    });
  });

  it('walks each hex edge from corner i to corner i + 1', () => {
    const board = standardBoard();
    const hex = centreHex(board);

    hex.edgeIds.forEach((edgeId, i) => {
      const edge = board.edges[edgeId];
      const corners = [hex.vertexIds[i], hex.vertexIds[(i + 1) % 6]].sort((a, b) => a - b);
      expect([edge.v1, edge.v2]).toEqual(corners);
    });
    expect(hex.neighborHexIds).toHaveLength(6);
  });

  it('lays out the seed-42 board with the standard composition', () => {
    const board = standardBoard(42);

    const wasteland = board.hexes.filter(hex => hex.terrain === 'wasteland');
    expect(wasteland).toHaveLength(1);
    expect(wasteland[0].token).toBeNull();

    const tokens = board.hexes
      .map(hex => hex.token)
      .filter((token): token is number => token !== null)
      .sort((a, b) => a - b);
    expect(tokens).toEqual([2, 3, 3, 4, 4, 5, 5, 6, 6, 8, 8, 9, 9, 10, 10, 11, 11, 12]);

    const terrainCounts: Record<string, number> = {};
    board.hexes.forEach(hex => {
      terrainCounts[hex.terrain] = (terrainCounts[hex.terrain] ?? 0) + 1;
    });
    expect(terrainCounts).toEqual({ timber: 4, stone: 3, meat: 4, grain: 4, iron: 3, wasteland: 1 });

    expect(board.ports).toHaveLength(9);
    expect(board.ports.filter(port => port.rate === 2)).toHaveLength(5);
    expect(board.ports.filter(port => port.rate === 3)).toHaveLength(4);
    expect(board.ports.filter(port => port.rate === 2).map(port => port.resource).sort())
      .toEqual(['grain', 'iron', 'meat', 'stone', 'timber']);
  });

  it('puts every port on a distinct coastal edge', () => {
    const board = standardBoard();
    const coastal = new Set(getCoastalEdges(board).map(edge => edge.id));

    expect(new Set(board.ports.map(port => port.edgeId)).size).toBe(board.ports.length);
    board.ports.forEach(port => {
      expect(coastal.has(port.edgeId)).toBe(true);
      const edge = board.edges[port.edgeId];
      expect(port.vertexIds).toEqual([edge.v1, edge.v2]);
    });
  });

  it('is deterministic for a seed', () => {
    expect(standardBoard(7)).toEqual(standardBoard(7));
  });

  it('rejects a radius below one', () => {
    expect(catchRuleError(() => generateBoard(0, new SeededRandom(1))).code).toBe('INVALID_ARGUMENT');
    expect(catchRuleError(() => generateBoard(1.5, new SeededRandom(1))).code).toBe('INVALID_ARGUMENT');
  });
});

describe('configurePorts', () => {
  it('replaces the generated ports', () => {
    const board = standardBoard();
    const [first, second] = getCoastalEdges(board);

    configurePorts(board, [
      { edgeId: first.id, rate: 2, resource: 'iron' },
      { edgeId: second.id, rate: 3, resource: null }
    ]);

    expect(board.ports).toEqual([
      { id: 0, edgeId: first.id, vertexIds: [first.v1, first.v2], rate: 2, resource: 'iron' },
      { id: 1, edgeId: second.id, vertexIds: [second.v1, second.v2], rate: 3, resource: null }
    ]);
  });

  it('rejects inland, repeated and unknown edges', () => {
    const board = standardBoard();
    const inland = centreHex(board).edgeIds[0];
    const coastal = getCoastalEdges(board)[0].id;

    expect(catchRuleError(() => configurePorts(board, [{ edgeId: inland, rate: 3, resource: null }])).message)
      .toBe(`Port edge ${inland} is not coastal`);
    expect(catchRuleError(() => configurePorts(board, [
      { edgeId: coastal, rate: 3, resource: null },
      { edgeId: coastal, rate: 2, resource: 'meat' }
    ])).message).toBe(`Port edge ${coastal} already assigned`);
    expect(catchRuleError(() => configurePorts(board, [{ edgeId: 500, rate: 3, resource: null }])).code)
      .toBe('INVALID_ARGUMENT');
  });

  it('rejects bad rates and resource-less 2:1 ports', () => {
    const board = standardBoard();
    const coastal = getCoastalEdges(board)[0].id;

    expect(catchRuleError(() => configurePorts(board, [{ edgeId: coastal, rate: 5, resource: null }])).message)
      .toBe('Port rate must be 2, 3, or 4');
    expect(catchRuleError(() => configurePorts(board, [{ edgeId: coastal, rate: 2, resource: null }])).message)
      .toBe('A 2:1 port must specify a resource');
  });
});
