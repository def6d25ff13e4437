import {
  Board, DevelopmentCardPlay, DevelopmentCardResult, DevelopmentCardType, GameOptions,
  GameState, Player, PlayerId, PlayerState, PortRates, Resources, ResourceType, RollResult, RobberResult,
  TurnPhase, RESOURCE_TYPES
} from './types';
import { config } from './config';
import { createComponentLogger } from './logger';
import { GameRuleError } from './errors';
import { MAX_SEED, SeededRandom, randomSeed } from './random';
import { generateBoard } from './boardGenerator';
import {
  addResource, addResources, createPlayer, emptyResources, spendResources
} from './playerManager';
import {
  BUILD_COSTS, canPlaceRoad, canPlaceSettlement, getEdge, getVertex, placeRoadOnBoard,
  placeSettlementOnBoard, removeRoadFromBoard, upgradeSettlementOnBoard
} from './buildingManager';
import {
  checkAllDiscarded, discardCards, getEligibleVictims, handleRobber, pickAutoDiscard, stealCard
} from './robberManager';
import {
  DevelopmentCardManager, countPlayable, playMonopoly, playYearOfPlenty
} from './developmentCardManager';
import { BankTradeResult, getPlayerPortRates, getPlayerTradeRate, tradeWithBank } from './tradeManager';
import { LARGEST_ARMY_MINIMUM, LONGEST_ROAD_MINIMUM, electHolder, findLongestRoad } from './scoring';
import { GameView, censorGameState } from './stateCensor';
import { initialPlacementOrder } from './setup';
import {
  parseCardType, parseDevelopmentCardPlay, parseGameState, parsePortConfigs, parseResourceSelection
} from './validation';

export const VICTORY_POINTS_TO_WIN = 10;
export const BANK_RESOURCE_COUNT = 19;
export const AWARD_POINTS = 2;

type Award = 'longestRoad' | 'largestArmy';

const log = createComponentLogger('game');

function copyPlayer(player: PlayerState): PlayerState {
  return {
    ...player,
    resources: { ...player.resources },
    developmentCards: [...player.developmentCards],
    newDevelopmentCards: [...player.newDevelopmentCards],
    settlements: [...player.settlements],
    cities: [...player.cities],
    roads: [...player.roads]
  };
}

/**
 * One game from board generation to the victory lock. Every command validates
 * "game not over", "this player's turn" and the allowed phase before it
 * touches state, and throws a {@link GameRuleError} without side effects when
 * it is rejected.
 */
export class Game {
  readonly seed: number;
  readonly board: Board;
  readonly devCardManager: DevelopmentCardManager;
  players: Player[];
  turnOrder: PlayerId[];
  currentTurnIndex: number;
  turnNumber: number;
  phase: TurnPhase;
  diceHistory: Array<[number, number]>;
  robberHexId: number;
  longestRoadHolder: PlayerId | null;
  largestArmyHolder: PlayerId | null;
  devCardPlayedThisTurn: boolean;
  gameOver: boolean;
  winnerId: PlayerId | null;
  bank: Resources;

  private rng: SeededRandom;
  private setupStep = 0;
  private setupSettlementVertexId: number | null = null;

  constructor(playerNames: string[], options: GameOptions = {}) {
    if (playerNames.length < 2) {
      throw new GameRuleError('INVALID_ARGUMENT', 'At least 2 players are required');
    }

    const seed = options.seed ?? config.defaultSeed ?? randomSeed();
    if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
      throw new GameRuleError('INVALID_ARGUMENT', `Seed must be an integer from 0 to ${MAX_SEED}`);
    }
    this.seed = seed;
    this.rng = new SeededRandom(seed);

    const customPorts = options.customPorts === undefined ? undefined : parsePortConfigs(options.customPorts);
    this.board = generateBoard(options.boardRadius ?? config.defaultBoardRadius, this.rng, customPorts);

    this.devCardManager = new DevelopmentCardManager();
    this.devCardManager.initialize(this.rng);

    this.players = playerNames.map((name, index) => createPlayer(index, name));
    this.turnOrder = this.players.map(player => player.id);
    this.currentTurnIndex = 0;
    this.turnNumber = 1;
    this.phase = 'roll';
    this.diceHistory = [];
    this.longestRoadHolder = null;
    this.largestArmyHolder = null;
    this.devCardPlayedThisTurn = false;
    this.gameOver = false;
    this.winnerId = null;
    this.bank = {
      timber: BANK_RESOURCE_COUNT,
      stone: BANK_RESOURCE_COUNT,
      meat: BANK_RESOURCE_COUNT,
      grain: BANK_RESOURCE_COUNT,
      iron: BANK_RESOURCE_COUNT
    };

    const wasteland = this.board.hexes.find(hex => hex.terrain === 'wasteland');
    this.robberHexId = wasteland ? wasteland.id : 0;

    log.info('Game created', {
      seed,
      boardRadius: this.board.radius,
      players: playerNames.length,
      hexes: this.board.hexes.length
    });
  }

  get currentPlayer(): Player {
    return this.players[this.turnOrder[this.currentTurnIndex]];
  }

  get winner(): Player | null {
    return this.winnerId === null ? null : this.players[this.winnerId];
  }

  getPlayer(playerId: PlayerId): Player {
    const player = this.players[playerId];
    if (!Number.isInteger(playerId) || !player) {
      throw new GameRuleError('INVALID_ARGUMENT', `Unknown player ${playerId}`);
    }
    return player;
  }

  /** Players who still owe a discard after a seven, with the amount owed. */
  getPendingDiscards(): Map<PlayerId, number> {
    const pending = new Map<PlayerId, number>();
    this.players.forEach(player => {
      if (player.mustDiscard > 0) pending.set(player.id, player.mustDiscard);
    });
    return pending;
  }

  // Guards

  private ensureGameActive(): void {
    if (this.gameOver) {
      throw new GameRuleError('GAME_OVER', 'The game is over');
    }
  }

  private requireCurrentPlayer(playerId: PlayerId): Player {
    if (playerId !== this.currentPlayer.id) {
      throw new GameRuleError('NOT_YOUR_TURN', `It is not player ${playerId}'s turn`);
    }
    return this.currentPlayer;
  }

  private requirePhase(...allowed: TurnPhase[]): void {
    if (!allowed.includes(this.phase)) {
      throw new GameRuleError('WRONG_PHASE', `Action requires phase ${allowed.join(' or ')}, current phase is ${this.phase}`);
    }
  }

  private requireTurn(playerId: PlayerId, ...allowed: TurnPhase[]): Player {
    this.ensureGameActive();
    const player = this.requireCurrentPlayer(playerId);
    this.requirePhase(...allowed);
    return player;
  }

  // Dice and production

  rollForTurn(playerId: PlayerId): RollResult {
    this.requireTurn(playerId, 'roll');

    const die1 = this.rng.nextInt(1, 6);
    const die2 = this.rng.nextInt(1, 6);
    const total = die1 + die2;
    this.diceHistory.push([die1, die2]);

    let payouts: Record<PlayerId, Resources>;
    if (total === 7) {
      handleRobber(this.players);
      payouts = this.emptyPayouts();
      this.phase = 'robber';
    } else {
      payouts = this.distributeResources(total);
      this.phase = 'trade';
    }

    log.debug('Dice rolled', { playerId, die1, die2, total, turnNumber: this.turnNumber });
    return { die1, die2, total, payouts };
  }

  private emptyPayouts(): Record<PlayerId, Resources> {
    const payouts: Record<PlayerId, Resources> = {};
    this.players.forEach(player => {
      payouts[player.id] = emptyResources();
    });
    return payouts;
  }

  private distributeResources(total: number): Record<PlayerId, Resources> {
    const payouts = this.emptyPayouts();

    this.board.hexes.forEach(hex => {
      const resource = hex.terrain;
      if (hex.token !== total || resource === 'wasteland' || hex.id === this.robberHexId) return;

      hex.vertexIds.forEach(vertexId => {
        const vertex = this.board.vertices[vertexId];
        if (vertex.owner === null || vertex.level === 0) return;

        const amount = Math.min(vertex.level, this.bank[resource]);
        if (amount === 0) return;

        this.bank[resource] -= amount;
        addResource(this.players[vertex.owner], resource, amount);
        payouts[vertex.owner][resource] += amount;
      });
    });

    return payouts;
  }

  // Robber

  discardForSeven(playerId: PlayerId, cards: Partial<Resources>): void {
    this.ensureGameActive();
    this.requirePhase('robber');
    const player = this.getPlayer(playerId);

    discardCards(player, this.bank, parseResourceSelection(cards));
    log.debug('Cards discarded', { playerId, cards });
  }

  /** Discards a uniform sample of the owed amount; returns the cards given up. */
  autoDiscardForSeven(playerId: PlayerId): ResourceType[] {
    this.ensureGameActive();
    this.requirePhase('robber');
    const player = this.getPlayer(playerId);
    if (player.mustDiscard === 0) return [];

    const picked = pickAutoDiscard(player, this.rng);
    const selection = emptyResources();
    picked.forEach(resource => selection[resource]++);
    discardCards(player, this.bank, selection);

    log.debug('Cards discarded automatically', { playerId, picked });
    return picked;
  }

  getRobberTargetHexes(): number[] {
    return this.board.hexes.filter(hex => hex.id !== this.robberHexId).map(hex => hex.id);
  }

  getEligibleRobberVictims(actingPlayerId: PlayerId, targetHexId: number): PlayerId[] {
    return getEligibleVictims(this.board, this.players, actingPlayerId, targetHexId);
  }

  /** Every hex the robber may move to, with the players who could be robbed there. */
  getRobberMoveOptions(actingPlayerId: PlayerId): Map<number, PlayerId[]> {
    const options = new Map<number, PlayerId[]>();
    this.getRobberTargetHexes().forEach(hexId => {
      options.set(hexId, this.getEligibleRobberVictims(actingPlayerId, hexId));
    });
    return options;
  }

  resolveRobberAfterSeven(playerId: PlayerId, targetHexId: number, victimId?: PlayerId | null): RobberResult {
    this.requireTurn(playerId, 'robber');
    if (!checkAllDiscarded(this.players)) {
      throw new GameRuleError('WRONG_PHASE', 'All pending discards must be completed before moving the robber');
    }

    const result = this.moveRobberAndSteal(playerId, targetHexId, victimId);
    this.phase = 'trade';
    return result;
  }

  private moveRobberAndSteal(actingPlayerId: PlayerId, targetHexId: number, victimId?: PlayerId | null): RobberResult {
    const eligible = this.getEligibleRobberVictims(actingPlayerId, targetHexId);
    if (targetHexId === this.robberHexId) {
      throw new GameRuleError('INVALID_TARGET', 'The robber must move to a different hex');
    }
    if (victimId !== undefined && victimId !== null && !eligible.includes(victimId)) {
      throw new GameRuleError('INVALID_TARGET', `Player ${victimId} cannot be robbed on hex ${targetHexId}`);
    }

    let chosen: PlayerId | null = null;
    if (victimId !== undefined && victimId !== null) {
      chosen = victimId;
    } else if (eligible.length > 0) {
      chosen = this.rng.choice(eligible);
    }

    this.robberHexId = targetHexId;
    const stolenResource = chosen === null
      ? null
      : stealCard(this.players[actingPlayerId], this.players[chosen], this.rng);

    log.info('Robber moved', { playerId: actingPlayerId, targetHexId, victimId: chosen, stole: stolenResource !== null });
    return { targetHexId, victimId: chosen, stolenResource };
  }

  // Trading

  finishTradePhase(playerId: PlayerId): void {
    this.requireTurn(playerId, 'trade');
    this.phase = 'build';
    log.debug('Trade phase finished', { playerId });
  }

  tradeWithBank(playerId: PlayerId, give: ResourceType, receive: ResourceType, rate?: number): BankTradeResult {
    const player = this.requireTurn(playerId, 'trade');
    if (!RESOURCE_TYPES.includes(give) || !RESOURCE_TYPES.includes(receive)) {
      throw new GameRuleError('INVALID_TRADE', 'Unknown resource in trade');
    }

    const result = tradeWithBank(player, this.board, this.bank, give, receive, rate);
    log.debug('Bank trade', { playerId, ...result });
    return result;
  }

  getPlayerPortRates(playerId: PlayerId): PortRates {
    return getPlayerPortRates(this.getPlayer(playerId), this.board);
  }

  getBestTradeRate(playerId: PlayerId, resource: ResourceType): number {
    return getPlayerTradeRate(this.getPlayer(playerId), this.board, resource);
  }

  // Building

  private payCost(player: Player, cost: Partial<Resources>): void {
    spendResources(player, cost);
    RESOURCE_TYPES.forEach(resource => {
      this.bank[resource] += cost[resource] ?? 0;
    });
  }

  private refundCost(player: Player, cost: Partial<Resources>): void {
    RESOURCE_TYPES.forEach(resource => {
      this.bank[resource] -= cost[resource] ?? 0;
    });
    addResources(player, cost);
  }

  placeSettlement(playerId: PlayerId, vertexId: number): void {
    const player = this.requireTurn(playerId, 'build');
    getVertex(this.board, vertexId);

    this.payCost(player, BUILD_COSTS.settlement);
    if (!canPlaceSettlement(this.board, vertexId, player.id, true)) {
      this.refundCost(player, BUILD_COSTS.settlement);
      throw new GameRuleError('ILLEGAL_PLACEMENT', `Settlement cannot be placed on vertex ${vertexId}`);
    }

    placeSettlementOnBoard(this.board, player, vertexId);
    log.debug('Settlement built', { playerId, vertexId });
    this.awardVictoryPoints(player, 1);
    this.recomputeLongestRoad();
  }

  upgradeToCity(playerId: PlayerId, vertexId: number): void {
    const player = this.requireTurn(playerId, 'build');
    getVertex(this.board, vertexId);

    this.payCost(player, BUILD_COSTS.city);
    try {
      upgradeSettlementOnBoard(this.board, player, vertexId);
    } catch (error) {
      this.refundCost(player, BUILD_COSTS.city);
      throw error;
    }

    log.debug('City built', { playerId, vertexId });
    this.awardVictoryPoints(player, 1);
  }

  placeRoad(playerId: PlayerId, edgeId: number): void {
    const player = this.requireTurn(playerId, 'build');
    getEdge(this.board, edgeId);

    this.payCost(player, BUILD_COSTS.road);
    if (!canPlaceRoad(this.board, edgeId, player.id)) {
      this.refundCost(player, BUILD_COSTS.road);
      throw new GameRuleError('ILLEGAL_PLACEMENT', `Road cannot be placed on edge ${edgeId}`);
    }

    placeRoadOnBoard(this.board, player, edgeId);
    log.debug('Road built', { playerId, edgeId });
    this.recomputeLongestRoad();
  }

  buyDevelopmentCard(playerId: PlayerId): DevelopmentCardType {
    const player = this.requireTurn(playerId, 'build');
    if (this.devCardManager.getDeckSize() === 0) {
      throw new GameRuleError('EMPTY_DECK', 'No development cards remain in the deck');
    }

    this.payCost(player, BUILD_COSTS.developmentCard);
    const card = this.devCardManager.draw();
    player.developmentCards.push(card);
    log.debug('Development card bought', { playerId, remaining: this.devCardManager.getDeckSize() });

    if (card === 'victoryPoint') {
      this.awardVictoryPoints(player, 1);
    } else {
      player.newDevelopmentCards.push(card);
    }
    return card;
  }

  // Development cards

  playDevelopmentCard(playerId: PlayerId, play: DevelopmentCardPlay): DevelopmentCardResult {
    const player = this.requireTurn(playerId, 'build');
    if (this.devCardPlayedThisTurn) {
      throw new GameRuleError('INVALID_CARD', 'Only one development card can be played per turn');
    }

    const cardType = parseCardType(play);
    const index = player.developmentCards.indexOf(cardType);
    if (index === -1) {
      throw new GameRuleError('INVALID_CARD', `Player does not hold a ${cardType} card`);
    }
    if (cardType === 'victoryPoint') {
      throw new GameRuleError('INVALID_CARD', 'Victory point cards cannot be played');
    }
    if (countPlayable(player, cardType) <= 0) {
      throw new GameRuleError('INVALID_CARD', 'Cannot play a development card on the turn it was bought');
    }

    const parsed = parseDevelopmentCardPlay(play);

    player.developmentCards.splice(index, 1);
    let result: DevelopmentCardResult;
    try {
      result = this.applyDevelopmentCard(player, parsed);
    } catch (error) {
      player.developmentCards.splice(index, 0, cardType);
      throw error;
    }

    this.devCardPlayedThisTurn = true;
    log.debug('Development card played', { playerId, card: cardType });
    return result;
  }

  private applyDevelopmentCard(player: Player, play: DevelopmentCardPlay): DevelopmentCardResult {
    switch (play.card) {
      case 'knight': {
        const robbery = this.moveRobberAndSteal(player.id, play.targetHexId, play.victimId);
        player.armySize++;
        this.recomputeLargestArmy();
        return { card: 'knight', ...robbery, armySize: player.armySize };
      }
      case 'roadBuilding':
        return { card: 'roadBuilding', edgeIds: this.placeFreeRoads(player, play.edgeIds) };
      case 'yearOfPlenty':
        return { card: 'yearOfPlenty', resources: playYearOfPlenty(player, this.bank, play.resources) };
      case 'monopoly':
        return {
          card: 'monopoly',
          resource: play.resource,
          totalTaken: playMonopoly(player, play.resource, this.players)
        };
      default: {
        const unsupported: never = play;
        throw new GameRuleError('INVALID_CARD', `Unsupported development card ${JSON.stringify(unsupported)}`);
      }
    }
  }

  /** Both roads or neither; longest road is recomputed once both are down. */
  private placeFreeRoads(player: Player, edgeIds: readonly number[]): number[] {
    const placed: number[] = [];
    try {
      for (const edgeId of edgeIds) {
        if (!canPlaceRoad(this.board, edgeId, player.id)) {
          throw new GameRuleError('ILLEGAL_PLACEMENT', `Road cannot be placed on edge ${edgeId}`);
        }
        placeRoadOnBoard(this.board, player, edgeId);
        placed.push(edgeId);
      }
    } catch (error) {
      [...placed].reverse().forEach(edgeId => removeRoadFromBoard(this.board, player, edgeId));
      throw error;
    }

    this.recomputeLongestRoad();
    return placed;
  }

  // Turn flow

  endTurn(playerId: PlayerId): Player {
    const player = this.requireTurn(playerId, 'trade', 'build');

    player.newDevelopmentCards = [];
    this.currentTurnIndex = (this.currentTurnIndex + 1) % this.turnOrder.length;
    if (this.currentTurnIndex === 0) {
      this.turnNumber++;
    }
    this.phase = 'roll';
    this.devCardPlayedThisTurn = false;

    log.debug('Turn ended', { playerId, nextPlayerId: this.currentPlayer.id, turnNumber: this.turnNumber });
    return this.currentPlayer;
  }

  // Initial placement

  isInitialPlacementOpen(): boolean {
    return this.diceHistory.length === 0 && this.setupStep < this.turnOrder.length * 2;
  }

  /** Player due to place next in snake order, or `null` once initial placement is closed. */
  getInitialPlacementPlayer(): PlayerId | null {
    if (!this.isInitialPlacementOpen()) return null;
    return initialPlacementOrder(this.turnOrder)[this.setupStep];
  }

  /** Settlement placed at the current step that still waits for its road. */
  getPendingInitialSettlement(): number | null {
    return this.isInitialPlacementOpen() ? this.setupSettlementVertexId : null;
  }

  isSecondInitialPlacement(): boolean {
    return this.setupStep >= this.turnOrder.length;
  }

  private requireInitialPlacement(playerId: PlayerId): Player {
    this.ensureGameActive();
    const expected = this.getInitialPlacementPlayer();
    if (expected === null) {
      throw new GameRuleError('WRONG_PHASE', 'Initial placements are only allowed before the first roll');
    }
    const player = this.getPlayer(playerId);
    if (player.id !== expected) {
      throw new GameRuleError('NOT_YOUR_TURN', `Player ${expected} places next, not player ${playerId}`);
    }
    return player;
  }

  /** Free settlement without the road connection requirement; one per placement step. */
  placeInitialSettlement(playerId: PlayerId, vertexId: number): void {
    const player = this.requireInitialPlacement(playerId);
    if (this.setupSettlementVertexId !== null) {
      throw new GameRuleError('WRONG_PHASE', 'The road for the last initial settlement must be placed first');
    }

    if (!canPlaceSettlement(this.board, vertexId, player.id, false)) {
      throw new GameRuleError('ILLEGAL_PLACEMENT', `Settlement cannot be placed on vertex ${vertexId}`);
    }

    placeSettlementOnBoard(this.board, player, vertexId);
    this.setupSettlementVertexId = vertexId;
    log.debug('Initial settlement placed', { playerId, vertexId, step: this.setupStep });
    this.awardVictoryPoints(player, 1);
    this.recomputeLongestRoad();
  }

  /** Free road touching the settlement just placed; completes the placement step. */
  placeInitialRoad(playerId: PlayerId, edgeId: number): void {
    const player = this.requireInitialPlacement(playerId);
    const settlementVertexId = this.setupSettlementVertexId;
    if (settlementVertexId === null) {
      throw new GameRuleError('WRONG_PHASE', 'An initial settlement must be placed before its road');
    }

    const edge = getEdge(this.board, edgeId);
    if (edge.v1 !== settlementVertexId && edge.v2 !== settlementVertexId) {
      throw new GameRuleError('ILLEGAL_PLACEMENT', `Initial road must touch vertex ${settlementVertexId}`);
    }
    if (!canPlaceRoad(this.board, edgeId, player.id)) {
      throw new GameRuleError('ILLEGAL_PLACEMENT', `Road cannot be placed on edge ${edgeId}`);
    }

    placeRoadOnBoard(this.board, player, edgeId);
    this.setupSettlementVertexId = null;
    this.setupStep++;
    log.debug('Initial road placed', { playerId, edgeId, step: this.setupStep });
    this.recomputeLongestRoad();
  }

  // Scoring

  private awardVictoryPoints(player: Player, points: number): void {
    player.victoryPoints += points;
    if (this.gameOver || player.victoryPoints < VICTORY_POINTS_TO_WIN) return;

    this.gameOver = true;
    this.winnerId = player.id;
    log.info('Game over', { winnerId: player.id, victoryPoints: player.victoryPoints, turnNumber: this.turnNumber });
  }

  private transferAward(award: Award, previous: PlayerId | null, next: PlayerId | null): void {
    if (previous !== null) {
      this.players[previous].victoryPoints -= AWARD_POINTS;
    }
    if (next !== null) {
      this.awardVictoryPoints(this.players[next], AWARD_POINTS);
    }
    log.info('Award changed hands', { award, previous, next });
  }

  private recomputeLongestRoad(): void {
    const lengths = new Map<PlayerId, number>();
    this.players.forEach(player => {
      player.longestRoadLength = findLongestRoad(this.board, player.id, player.roads);
      lengths.set(player.id, player.longestRoadLength);
    });

    const previous = this.longestRoadHolder;
    const holder = electHolder(lengths, previous, LONGEST_ROAD_MINIMUM);
    if (holder === previous) return;

    this.longestRoadHolder = holder;
    this.transferAward('longestRoad', previous, holder);
  }

  private recomputeLargestArmy(): void {
    const armies = new Map<PlayerId, number>();
    this.players.forEach(player => armies.set(player.id, player.armySize));

    const previous = this.largestArmyHolder;
    const holder = electHolder(armies, previous, LARGEST_ARMY_MINIMUM);
    if (holder === previous) return;

    this.largestArmyHolder = holder;
    this.transferAward('largestArmy', previous, holder);
  }

  // Snapshots

  /**
   * Full, unredacted snapshot. It contains the draw pile and random stream
   * state; use {@link getStateForPlayer} for anything shown to a player.
   */
  getState(): GameState {
    return {
      seed: this.seed,
      rngState: this.rng.getState(),
      boardRadius: this.board.radius,
      turnOrder: [...this.turnOrder],
      currentTurnIndex: this.currentTurnIndex,
      turnNumber: this.turnNumber,
      phase: this.phase,
      diceHistory: this.diceHistory.map((roll): [number, number] => [roll[0], roll[1]]),
      robberHexId: this.robberHexId,
      longestRoadHolder: this.longestRoadHolder,
      largestArmyHolder: this.largestArmyHolder,
      devCardPlayedThisTurn: this.devCardPlayedThisTurn,
      setupStep: this.setupStep,
      setupSettlementVertexId: this.setupSettlementVertexId,
      gameOver: this.gameOver,
      winnerId: this.winnerId,
      bank: { ...this.bank },
      developmentDeck: this.devCardManager.getDeck(),
      players: this.players.map(copyPlayer),
      board: {
        hexes: this.board.hexes.map(hex => ({ id: hex.id, terrain: hex.terrain, token: hex.token })),
        vertices: this.board.vertices.map(vertex => ({ id: vertex.id, owner: vertex.owner, level: vertex.level })),
        edges: this.board.edges.map(edge => ({ id: edge.id, owner: edge.owner })),
        ports: this.board.ports.map(port => ({ edgeId: port.edgeId, rate: port.rate, resource: port.resource }))
      }
    };
  }

  getStateForPlayer(viewerId: PlayerId | null): GameView {
    return censorGameState(this.getState(), viewerId);
  }

  /** Rebuilds a game from an untrusted snapshot, validating it first. */
  static fromState(data: unknown): Game {
    const state = parseGameState(data);
    const game = new Game(state.players.map(player => player.name), {
      seed: state.seed,
      boardRadius: state.boardRadius,
      customPorts: state.board.ports
    });
    game.restoreState(state);
    log.info('Game restored', { seed: state.seed, turnNumber: state.turnNumber });
    return game;
  }

  private restoreState(state: GameState): void {
    this.checkSnapshotShape(state);

    this.players = state.players.map(copyPlayer);
    this.turnOrder = [...state.turnOrder];
    this.currentTurnIndex = state.currentTurnIndex;
    this.turnNumber = state.turnNumber;
    this.phase = state.phase;
    this.diceHistory = state.diceHistory.map((roll): [number, number] => [roll[0], roll[1]]);
    this.robberHexId = state.robberHexId;
    this.longestRoadHolder = state.longestRoadHolder;
    this.largestArmyHolder = state.largestArmyHolder;
    this.devCardPlayedThisTurn = state.devCardPlayedThisTurn;
    this.setupStep = state.setupStep;
    this.setupSettlementVertexId = state.setupSettlementVertexId;
    this.gameOver = state.gameOver;
    this.winnerId = state.winnerId;
    this.bank = { ...state.bank };
    this.devCardManager.setDeck(state.developmentDeck);
    this.rng.setState(state.rngState);

    state.board.hexes.forEach(saved => {
      const hex = this.board.hexes[saved.id];
      hex.terrain = saved.terrain;
      hex.token = saved.token;
    });
    state.board.vertices.forEach(saved => {
      const vertex = this.board.vertices[saved.id];
      vertex.owner = saved.owner;
      vertex.level = saved.level;
    });
    state.board.edges.forEach(saved => {
      this.board.edges[saved.id].owner = saved.owner;
    });
  }

  private checkSnapshotShape(state: GameState): void {
    const fail = (message: string): never => {
      throw new GameRuleError('INVALID_ARGUMENT', `Invalid snapshot: ${message}`);
    };
    const playerCount = state.players.length;
    const isPlayerId = (id: PlayerId | null) => id === null || id < playerCount;

    if (playerCount !== this.players.length) fail('player count mismatch');
    state.players.forEach((player, index) => {
      if (player.id !== index) fail(`player at index ${index} has id ${player.id}`);
    });
    if (state.turnOrder.length !== playerCount || [...state.turnOrder].sort((a, b) => a - b).some((id, i) => id !== i)) {
      fail('turn order must list every player once');
    }
    if (state.currentTurnIndex >= playerCount) fail('current turn index out of range');
    if (state.robberHexId >= this.board.hexes.length) fail('robber hex out of range');
    if (state.setupStep > playerCount * 2) fail('initial placement step out of range');
    if (state.setupSettlementVertexId !== null && state.setupSettlementVertexId >= this.board.vertices.length) {
      fail('pending initial settlement out of range');
    }
    if (!isPlayerId(state.longestRoadHolder) || !isPlayerId(state.largestArmyHolder) || !isPlayerId(state.winnerId)) {
      fail('award holder or winner is not a player');
    }

    const sameIds = (items: Array<{ id: number }>, expected: number) =>
      items.length === expected && items.every((item, index) => item.id === index);
    if (!sameIds(state.board.hexes, this.board.hexes.length)) fail('hex list does not match the board');
    if (!sameIds(state.board.vertices, this.board.vertices.length)) fail('vertex list does not match the board');
    if (!sameIds(state.board.edges, this.board.edges.length)) fail('edge list does not match the board');
    if (state.board.vertices.some(vertex => !isPlayerId(vertex.owner))) fail('vertex owner is not a player');
    if (state.board.edges.some(edge => !isPlayerId(edge.owner))) fail('edge owner is not a player');
  }
}
