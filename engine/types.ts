export type ResourceType = 'timber' | 'stone' | 'meat' | 'grain' | 'iron';
export type TerrainType = ResourceType | 'wasteland';
export type DevelopmentCardType = 'knight' | 'victoryPoint' | 'roadBuilding' | 'yearOfPlenty' | 'monopoly';
export type TurnPhase = 'roll' | 'robber' | 'trade' | 'build';
export type PlayerId = number;

/** 0 = empty, 1 = settlement, 2 = city */
export type BuildingLevel = 0 | 1 | 2;

export const RESOURCE_TYPES: readonly ResourceType[] = ['timber', 'stone', 'meat', 'grain', 'iron'];

export interface Resources {
  timber: number;
  stone: number;
  meat: number;
  grain: number;
  iron: number;
}

export interface HexCoordinate {
  q: number;
  r: number;
}

export interface Coordinate {
  x: number;
  y: number;
}

export interface Hex extends HexCoordinate {
  id: number;
  terrain: TerrainType;
  token: number | null;
  vertexIds: number[];
  edgeIds: number[];
  neighborHexIds: number[];
}

export interface Vertex {
  id: number;
  owner: PlayerId | null;
  level: BuildingLevel;
  adjacentVertexIds: number[];
  adjacentEdgeIds: number[];
  hexIds: number[];
}

export interface Edge {
  id: number;
  v1: number;
  v2: number;
  owner: PlayerId | null;
  hexIds: number[];
}

export interface Port {
  id: number;
  edgeId: number;
  vertexIds: [number, number];
  rate: number;
  resource: ResourceType | null;
}

export interface PortConfig {
  edgeId: number;
  rate: number;
  resource: ResourceType | null;
}

/** Hexes, vertices and edges are stored at the index equal to their id. */
export interface Board {
  radius: number;
  hexes: Hex[];
  vertices: Vertex[];
  edges: Edge[];
  ports: Port[];
}

export interface Player {
  id: PlayerId;
  name: string;
  resources: Resources;
  /** Every held card, victory-point cards and this turn's purchases included. */
  developmentCards: DevelopmentCardType[];
  /** Cards bought during the current turn; not playable until the next one. */
  newDevelopmentCards: DevelopmentCardType[];
  victoryPoints: number;
  settlements: number[];
  cities: number[];
  roads: number[];
  mustDiscard: number;
  armySize: number;
  longestRoadLength: number;
}

export interface DiceResult {
  die1: number;
  die2: number;
  total: number;
}

export interface RollResult extends DiceResult {
  payouts: Record<PlayerId, Resources>;
}

export interface RobberResult {
  targetHexId: number;
  victimId: PlayerId | null;
  stolenResource: ResourceType | null;
}

export interface PortRates {
  generic: number;
  specific: Partial<Record<ResourceType, number>>;
}

export type DevelopmentCardPlay =
  | { card: 'knight'; targetHexId: number; victimId?: PlayerId | null }
  | { card: 'roadBuilding'; edgeIds: [number, number] }
  | { card: 'yearOfPlenty'; resources: [ResourceType, ResourceType] }
  | { card: 'monopoly'; resource: ResourceType };

export type DevelopmentCardResult =
  | ({ card: 'knight'; armySize: number } & RobberResult)
  | { card: 'roadBuilding'; edgeIds: number[] }
  | { card: 'yearOfPlenty'; resources: ResourceType[] }
  | { card: 'monopoly'; resource: ResourceType; totalTaken: number };

export interface GameOptions {
  seed?: number;
  boardRadius?: number;
  customPorts?: PortConfig[];
}

export interface PlayerState {
  id: PlayerId;
  name: string;
  resources: Resources;
  developmentCards: DevelopmentCardType[];
  newDevelopmentCards: DevelopmentCardType[];
  victoryPoints: number;
  settlements: number[];
  cities: number[];
  roads: number[];
  mustDiscard: number;
  armySize: number;
  longestRoadLength: number;
}

export interface BoardState {
  hexes: Array<{ id: number; terrain: TerrainType; token: number | null }>;
  vertices: Array<{ id: number; owner: PlayerId | null; level: BuildingLevel }>;
  edges: Array<{ id: number; owner: PlayerId | null }>;
  ports: PortConfig[];
}

/** JSON-safe snapshot of a whole game. */
export interface GameState {
  seed: number;
  rngState: number;
  boardRadius: number;
  turnOrder: PlayerId[];
  currentTurnIndex: number;
  turnNumber: number;
  phase: TurnPhase;
  diceHistory: Array<[number, number]>;
  robberHexId: number;
  longestRoadHolder: PlayerId | null;
  largestArmyHolder: PlayerId | null;
  devCardPlayedThisTurn: boolean;
  /** Completed steps of the snake-order initial placement. */
  setupStep: number;
  setupSettlementVertexId: number | null;
  gameOver: boolean;
  winnerId: PlayerId | null;
  bank: Resources;
  developmentDeck: DevelopmentCardType[];
  players: PlayerState[];
  board: BoardState;
}

export interface InitialPlacement {
  playerId: PlayerId;
  settlementVertexId: number;
  roadEdgeId: number;
  startingResources: Resources;
}
