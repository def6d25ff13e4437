import { z } from 'zod';
import { DevelopmentCardPlay, DevelopmentCardType, GameState, PortConfig, Resources } from './types';
import { GameRuleError, GameErrorCode } from './errors';
import { MAX_SEED } from './random';

// Resource type schema (wasteland is never a tradeable card)
const resourceTypeSchema = z.enum(['timber', 'stone', 'meat', 'grain', 'iron']);

const terrainTypeSchema = z.enum(['timber', 'stone', 'meat', 'grain', 'iron', 'wasteland']);

const developmentCardTypeSchema = z.enum(['knight', 'victoryPoint', 'roadBuilding', 'yearOfPlenty', 'monopoly']);

const idSchema = z.number().int().min(0);

const countSchema = z.number().int().min(0);

// Full resource record (bank, player hands)
const resourcesSchema = z.object({
  timber: countSchema,
  stone: countSchema,
  meat: countSchema,
  grain: countSchema,
  iron: countSchema
}).strict();

// Partial resource selection (discards, costs)
const resourceSelectionSchema = resourcesSchema.partial().strict();

const portConfigSchema = z.object({
  edgeId: idSchema,
  rate: z.number().int(),
  resource: resourceTypeSchema.nullable()
});

const developmentCardPlaySchema = z.discriminatedUnion('card', [
  z.object({
    card: z.literal('knight'),
    targetHexId: idSchema,
    victimId: idSchema.nullable().optional()
  }),
  z.object({
    card: z.literal('roadBuilding'),
    edgeIds: z.tuple([idSchema, idSchema])
  }),
  z.object({
    card: z.literal('yearOfPlenty'),
    resources: z.tuple([resourceTypeSchema, resourceTypeSchema])
  }),
  z.object({
    card: z.literal('monopoly'),
    resource: resourceTypeSchema
  })
]);

const playerStateSchema = z.object({
  id: idSchema,
  name: z.string(),
  resources: resourcesSchema,
  developmentCards: z.array(developmentCardTypeSchema),
  newDevelopmentCards: z.array(developmentCardTypeSchema),
  victoryPoints: countSchema,
  settlements: z.array(idSchema),
  cities: z.array(idSchema),
  roads: z.array(idSchema),
  mustDiscard: countSchema,
  armySize: countSchema,
  longestRoadLength: countSchema
});

const boardStateSchema = z.object({
  hexes: z.array(z.object({
    id: idSchema,
    terrain: terrainTypeSchema,
    token: z.number().int().min(2).max(12).nullable()
  })),
  vertices: z.array(z.object({
    id: idSchema,
    owner: idSchema.nullable(),
    level: z.union([z.literal(0), z.literal(1), z.literal(2)])
  })),
  edges: z.array(z.object({
    id: idSchema,
    owner: idSchema.nullable()
  })),
  ports: z.array(portConfigSchema)
});

export const gameStateSchema = z.object({
  seed: z.number().int().min(0).max(MAX_SEED),
  rngState: z.number().int().min(0).max(MAX_SEED),
  boardRadius: z.number().int().min(1),
  turnOrder: z.array(idSchema).min(2),
  currentTurnIndex: idSchema,
  turnNumber: z.number().int().min(1),
  phase: z.enum(['roll', 'robber', 'trade', 'build']),
  diceHistory: z.array(z.tuple([z.number().int().min(1).max(6), z.number().int().min(1).max(6)])),
  robberHexId: idSchema,
  longestRoadHolder: idSchema.nullable(),
  largestArmyHolder: idSchema.nullable(),
  devCardPlayedThisTurn: z.boolean(),
  setupStep: z.number().int().min(0),
  setupSettlementVertexId: idSchema.nullable(),
  gameOver: z.boolean(),
  winnerId: idSchema.nullable(),
  bank: resourcesSchema,
  developmentDeck: z.array(developmentCardTypeSchema),
  players: z.array(playerStateSchema).min(2),
  board: boardStateSchema
});

export const schemas = {
  discard: resourceSelectionSchema,
  playDevelopmentCard: developmentCardPlaySchema,
  customPorts: z.array(portConfigSchema),
  gameState: gameStateSchema
};

export type CommandName = keyof typeof schemas;

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: string };

function formatIssues(error: z.ZodError): string {
  return error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
}

/**
 * Validates untrusted input against a command schema without throwing.
 */
export function validateCommand<T extends CommandName>(
  commandName: T,
  data: unknown
): ValidationResult<z.infer<(typeof schemas)[T]>> {
  return validateWith(schemas[commandName], data);
}

export function validateWith<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: `Invalid input: ${formatIssues(result.error)}` };
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, code: GameErrorCode): z.infer<S> {
  const result = validateWith(schema, data);
  if (!result.success) {
    throw new GameRuleError(code, result.error);
  }
  return result.data;
}

export function parseResourceSelection(data: unknown): Partial<Resources> {
  return parseOrThrow(resourceSelectionSchema, data, 'INVALID_DISCARD');
}

export function parseDevelopmentCardPlay(data: unknown): DevelopmentCardPlay {
  return parseOrThrow(developmentCardPlaySchema, data, 'INVALID_CARD_ARGUMENTS');
}

export function parsePortConfigs(data: unknown): PortConfig[] {
  return parseOrThrow(schemas.customPorts, data, 'INVALID_ARGUMENT');
}

export function parseGameState(data: unknown): GameState {
  return parseOrThrow(gameStateSchema, data, 'INVALID_ARGUMENT');
}

const cardTypeSchema = z.object({ card: developmentCardTypeSchema });

/** Reads only the `card` discriminator so ownership can be checked before the payload. */
export function parseCardType(data: unknown): DevelopmentCardType {
  return parseOrThrow(cardTypeSchema, data, 'INVALID_CARD_ARGUMENTS').card;
}
