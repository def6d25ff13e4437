export * from './types';
export { GameRuleError, isGameRuleError } from './errors';
export type { GameErrorCode } from './errors';
export { Game, VICTORY_POINTS_TO_WIN, BANK_RESOURCE_COUNT } from './game';
export { SeededRandom, randomSeed } from './random';
export { generateBoard, getCoastalEdges, getHexCoordinates } from './boardGenerator';
export { BUILD_COSTS, canPlaceRoad, canPlaceSettlement } from './buildingManager';
export { findLongestRoad, electHolder, LONGEST_ROAD_MINIMUM, LARGEST_ARMY_MINIMUM } from './scoring';
export { DEVELOPMENT_CARD_COUNTS } from './developmentCardManager';
export { DEFAULT_TRADE_RATE } from './tradeManager';
export { initialPlacementOrder, grantStartingResources, autoInitialSetup } from './setup';
export type { AutoSetupOptions } from './setup';
export { censorGameState } from './stateCensor';
export type { GameView, PlayerView } from './stateCensor';
export { validateCommand, schemas } from './validation';
export type { CommandName, ValidationResult } from './validation';
export { GameCache, MemorySnapshotBackend, RedisSnapshotBackend, createSnapshotBackend, gameCache } from './cache';
export type { SnapshotBackend } from './cache';
export { config, loadConfig } from './config';
export type { AppConfig } from './config';
export { logger, createComponentLogger } from './logger';
