import { Board, Coordinate, Edge, Hex, HexCoordinate, Port, PortConfig, ResourceType, TerrainType, Vertex, RESOURCE_TYPES } from './types';
import { SeededRandom } from './random';
import { GameRuleError } from './errors';
import { coordinateToKey, hexKey, pushUnique } from './utils';

const STANDARD_TILE_COUNT = 19;
const STANDARD_TOKENS = [2, 3, 3, 4, 4, 5, 5, 6, 6, 8, 8, 9, 9, 10, 10, 11, 11, 12];
const TOKEN_CYCLE = [2, 3, 4, 5, 6, 8, 9, 10, 11, 12];
const MAX_PORTS = 9;

const AXIAL_DIRECTIONS: HexCoordinate[] = [
  { q: 1, r: 0 },
  { q: 1, r: -1 },
  { q: 0, r: -1 },
  { q: -1, r: 0 },
  { q: -1, r: 1 },
  { q: 0, r: 1 }
];

const STANDARD_PORTS: Array<{ rate: number; resource: ResourceType | null }> = [
  { rate: 2, resource: 'timber' },
  { rate: 2, resource: 'stone' },
  { rate: 2, resource: 'meat' },
  { rate: 2, resource: 'grain' },
  { rate: 2, resource: 'iron' },
  { rate: 3, resource: null },
  { rate: 3, resource: null },
  { rate: 3, resource: null },
  { rate: 3, resource: null }
];

/**
 * Builds the hex/vertex/edge/port graph for a board of the given radius.
 * Draws from `rng` in a fixed order: terrain shuffle, token shuffle, port shuffle.
 */
export function generateBoard(radius: number, rng: SeededRandom, customPorts?: PortConfig[]): Board {
  if (!Number.isInteger(radius) || radius < 1) {
    throw new GameRuleError('INVALID_ARGUMENT', 'Board radius must be an integer >= 1');
  }

  const coords = getHexCoordinates(radius);
  const terrain = rng.shuffle(buildTerrainList(coords.length));
  const tokens = rng.shuffle(buildTokenList(coords.length));

  const board: Board = { radius, hexes: [], vertices: [], edges: [], ports: [] };
  const vertexLookup = new Map<string, number>();
  const edgeLookup = new Map<string, number>();
  let tokenIndex = 0;

  coords.forEach((coord, hexId) => {
    const vertexIds = getHexCorners(coord).map(corner => {
      const key = coordinateToKey(corner);
      let vertexId = vertexLookup.get(key);
      if (vertexId === undefined) {
        vertexId = board.vertices.length;
        vertexLookup.set(key, vertexId);
        board.vertices.push(createVertex(vertexId));
      }
      return vertexId;
    });

    const edgeIds: number[] = [];
    for (let i = 0; i < 6; i++) {
      const a = vertexIds[i];
      const b = vertexIds[(i + 1) % 6];
      const v1 = Math.min(a, b);
      const v2 = Math.max(a, b);
      const key = `${v1}-${v2}`;

      let edgeId = edgeLookup.get(key);
      if (edgeId === undefined) {
        edgeId = board.edges.length;
        edgeLookup.set(key, edgeId);
        board.edges.push({ id: edgeId, v1, v2, owner: null, hexIds: [] });
      }
      edgeIds.push(edgeId);

      pushUnique(board.vertices[a].adjacentVertexIds, b);
      pushUnique(board.vertices[b].adjacentVertexIds, a);
      pushUnique(board.vertices[a].adjacentEdgeIds, edgeId);
      pushUnique(board.vertices[b].adjacentEdgeIds, edgeId);
    }

    const hexTerrain = terrain[hexId];
    const hex: Hex = {
      id: hexId,
      q: coord.q,
      r: coord.r,
      terrain: hexTerrain,
      token: hexTerrain === 'wasteland' ? null : tokens[tokenIndex++],
      vertexIds,
      edgeIds,
      neighborHexIds: []
    };
    board.hexes.push(hex);

    vertexIds.forEach(id => pushUnique(board.vertices[id].hexIds, hexId));
    edgeIds.forEach(id => pushUnique(board.edges[id].hexIds, hexId));
  });

  const coordsToHexId = new Map<string, number>();
  board.hexes.forEach(hex => coordsToHexId.set(hexKey(hex), hex.id));

  board.hexes.forEach(hex => {
    AXIAL_DIRECTIONS.forEach(direction => {
      const neighborId = coordsToHexId.get(hexKey({ q: hex.q + direction.q, r: hex.r + direction.r }));
      if (neighborId !== undefined) {
        hex.neighborHexIds.push(neighborId);
      }
    });
  });

  board.ports = generatePorts(board, rng);
  if (customPorts !== undefined) {
    configurePorts(board, customPorts);
  }

  return board;
}

/** Axial coordinates within `radius` of the origin, q-major. */
export function getHexCoordinates(radius: number): HexCoordinate[] {
  const coords: HexCoordinate[] = [];
  for (let q = -radius; q <= radius; q++) {
    const r1 = Math.max(-radius, -q - radius);
    const r2 = Math.min(radius, -q + radius);
    for (let r = r1; r <= r2; r++) {
      coords.push({ q, r });
    }
  }
  return coords;
}

/** Flat-top corners of a unit hex, counter-clockwise from angle 0. */
export function getHexCorners(coord: HexCoordinate): Coordinate[] {
  const size = 1;
  const x = size * (3 / 2 * coord.q);
  const y = size * (Math.sqrt(3) / 2 * coord.q + Math.sqrt(3) * coord.r);

  const corners: Coordinate[] = [];
  for (let i = 0; i < 6; i++) {
    const angle = Math.PI / 3 * i;
    corners.push({
      x: x + size * Math.cos(angle),
      y: y + size * Math.sin(angle)
    });
  }
  return corners;
}

export function getCoastalEdges(board: Board): Edge[] {
  return board.edges
    .filter(edge => edge.hexIds.length === 1)
    .sort((a, b) => a.id - b.id);
}

/**
 * Replaces the board's ports with an explicit list.
 * @throws GameRuleError when an entry names a missing, inland or repeated edge, or an invalid rate/resource
 */
export function configurePorts(board: Board, customPorts: PortConfig[]): void {
  const coastalEdgeIds = new Set(getCoastalEdges(board).map(edge => edge.id));
  const usedEdges = new Set<number>();
  const ports: Port[] = [];

  customPorts.forEach((item, portId) => {
    const edge = board.edges[item.edgeId];
    if (!edge) {
      throw new GameRuleError('INVALID_ARGUMENT', `Port edge ${item.edgeId} is not a valid edge`);
    }
    if (!coastalEdgeIds.has(edge.id)) {
      throw new GameRuleError('INVALID_ARGUMENT', `Port edge ${item.edgeId} is not coastal`);
    }
    if (usedEdges.has(edge.id)) {
      throw new GameRuleError('INVALID_ARGUMENT', `Port edge ${item.edgeId} already assigned`);
    }
    if (![2, 3, 4].includes(item.rate)) {
      throw new GameRuleError('INVALID_ARGUMENT', 'Port rate must be 2, 3, or 4');
    }
    if (item.resource !== null && !RESOURCE_TYPES.includes(item.resource)) {
      throw new GameRuleError('INVALID_ARGUMENT', `Invalid port resource: ${String(item.resource)}`);
    }
    if (item.rate === 2 && item.resource === null) {
      throw new GameRuleError('INVALID_ARGUMENT', 'A 2:1 port must specify a resource');
    }

    ports.push({
      id: portId,
      edgeId: edge.id,
      vertexIds: [edge.v1, edge.v2],
      rate: item.rate,
      resource: item.resource
    });
    usedEdges.add(edge.id);
  });

  board.ports = ports;
}

function createVertex(id: number): Vertex {
  return {
    id,
    owner: null,
    level: 0,
    adjacentVertexIds: [],
    adjacentEdgeIds: [],
    hexIds: []
  };
}

function buildTerrainList(tileCount: number): TerrainType[] {
  if (tileCount === STANDARD_TILE_COUNT) {
    return [
      'timber', 'timber', 'timber', 'timber',
      'stone', 'stone', 'stone',
      'meat', 'meat', 'meat', 'meat',
      'grain', 'grain', 'grain', 'grain',
      'iron', 'iron', 'iron',
      'wasteland'
    ];
  }

  const terrain: TerrainType[] = [];
  for (let i = 0; i < tileCount - 1; i++) {
    terrain.push(RESOURCE_TYPES[i % RESOURCE_TYPES.length]);
  }
  terrain.push('wasteland');
  return terrain;
}

function buildTokenList(tileCount: number): number[] {
  const productiveTiles = tileCount - 1;
  if (productiveTiles === STANDARD_TOKENS.length) {
    return [...STANDARD_TOKENS];
  }

  const tokens: number[] = [];
  for (let i = 0; i < productiveTiles; i++) {
    tokens.push(TOKEN_CYCLE[i % TOKEN_CYCLE.length]);
  }
  return tokens;
}

function generatePorts(board: Board, rng: SeededRandom): Port[] {
  const coastalEdges = getCoastalEdges(board);
  if (coastalEdges.length === 0) return [];

  let portTypes: Array<{ rate: number; resource: ResourceType | null }>;
  if (board.hexes.length === STANDARD_TILE_COUNT && coastalEdges.length >= MAX_PORTS) {
    portTypes = STANDARD_PORTS;
  } else {
    const portCount = Math.max(1, Math.min(MAX_PORTS, Math.floor(coastalEdges.length / 3)));
    portTypes = Array.from({ length: portCount }, () => ({ rate: 3, resource: null }));
  }

  const indices = selectPortLocations(coastalEdges.length, portTypes.length);
  const shuffledPorts = rng.shuffle(portTypes);

  return indices.map((edgeIndex, portId) => {
    const edge = coastalEdges[edgeIndex];
    const portType = shuffledPorts[portId];
    return {
      id: portId,
      edgeId: edge.id,
      vertexIds: [edge.v1, edge.v2],
      rate: portType.rate,
      resource: portType.resource
    };
  });
}

// Evenly spaced indices into the coastal edge list, topped up if rounding collided
function selectPortLocations(totalEdges: number, targetCount: number): number[] {
  const count = Math.min(targetCount, totalEdges);
  const step = totalEdges / count;
  const chosen = new Set<number>();

  for (let i = 0; i < count; i++) {
    chosen.add(Math.floor(i * step) % totalEdges);
  }

  let candidate = 0;
  while (chosen.size < count) {
    chosen.add(candidate++);
  }

  return Array.from(chosen).sort((a, b) => a - b);
}
