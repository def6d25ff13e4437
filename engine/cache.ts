import { createClient } from 'redis';
import { Game } from './game';
import { config } from './config';
import { createComponentLogger } from './logger';

const log = createComponentLogger('cache');

const GAME_KEY_PREFIX = 'game:';
const ACTIVE_GAMES_KEY = 'game:active';
const MAX_RECONNECT_ATTEMPTS = 10;

/** The handful of key/value and set operations snapshot storage needs. */
export interface SnapshotBackend {
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isReady(): boolean;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<void>;
  addMember(setKey: string, member: string): Promise<void>;
  removeMember(setKey: string, member: string): Promise<void>;
  members(setKey: string): Promise<string[]>;
}

type RedisClient = ReturnType<typeof createClient>;

export class RedisSnapshotBackend implements SnapshotBackend {
  readonly name = 'redis';
  private client: RedisClient;

  constructor(url: string) {
    this.client = createClient({
      url,
      socket: {
        reconnectStrategy: (retries: number) => {
          if (retries > MAX_RECONNECT_ATTEMPTS) {
            log.error('Redis reconnection failed', { attempts: retries });
            return false;
          }
          return Math.min(retries * 50, 1000);
        }
      }
    });

    this.client.on('error', (error: unknown) => {
      log.error('Redis client error', { error });
    });
    this.client.on('ready', () => {
      log.info('Redis client connected');
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  isReady(): boolean {
    return this.client.isReady;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, { EX: ttlSeconds });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async addMember(setKey: string, member: string): Promise<void> {
    await this.client.sAdd(setKey, member);
  }

  async removeMember(setKey: string, member: string): Promise<void> {
    await this.client.sRem(setKey, member);
  }

  async members(setKey: string): Promise<string[]> {
    return this.client.sMembers(setKey);
  }
}

interface StoredValue {
  value: string;
  expiresAt: number;
}

/** In-process stand-in used when no Redis URL is configured, and by tests. */
export class MemorySnapshotBackend implements SnapshotBackend {
  readonly name = 'memory';
  private values = new Map<string, StoredValue>();
  private sets = new Map<string, Set<string>>();
  private ready = false;

  constructor(private readonly now: () => number = Date.now) {}

  async connect(): Promise<void> {
    this.ready = true;
  }

  async disconnect(): Promise<void> {
    this.ready = false;
  }

  isReady(): boolean {
    return this.ready;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.values.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | null> {
    const stored = this.values.get(key);
    if (!stored) return null;
    if (stored.expiresAt <= this.now()) {
      this.values.delete(key);
      return null;
    }
    return stored.value;
  }

  async del(key: string): Promise<void> {
    this.values.delete(key);
  }

  async addMember(setKey: string, member: string): Promise<void> {
    const members = this.sets.get(setKey) ?? new Set<string>();
    members.add(member);
    this.sets.set(setKey, members);
  }

  async removeMember(setKey: string, member: string): Promise<void> {
    this.sets.get(setKey)?.delete(member);
  }

  async members(setKey: string): Promise<string[]> {
    return Array.from(this.sets.get(setKey) ?? []);
  }
}

export function createSnapshotBackend(redisUrl: string | null = config.redisUrl): SnapshotBackend {
  return redisUrl === null ? new MemorySnapshotBackend() : new RedisSnapshotBackend(redisUrl);
}

/**
 * Stores game snapshots under `game:<id>` with an expiry and keeps the ids of
 * stored games in the `game:active` set. Storage failures are logged and
 * reported as a skipped save or a missing game; they never reach the caller.
 */
export class GameCache {
  constructor(
    private readonly backend: SnapshotBackend = createSnapshotBackend(),
    private readonly ttlSeconds: number = config.snapshotTtlSeconds
  ) {}

  async connect(): Promise<void> {
    try {
      await this.backend.connect();
      log.info('Snapshot storage ready', { backend: this.backend.name });
    } catch (error) {
      log.error('Failed to connect snapshot storage', { backend: this.backend.name, error });
    }
  }

  /** Returns whether the snapshot was written. */
  async saveGame(gameId: string, game: Game): Promise<boolean> {
    if (!this.backend.isReady()) {
      log.warn('Snapshot storage not connected, skipping save', { gameId });
      return false;
    }

    try {
      await this.backend.set(`${GAME_KEY_PREFIX}${gameId}`, JSON.stringify(game.getState()), this.ttlSeconds);
      await this.backend.addMember(ACTIVE_GAMES_KEY, gameId);
      return true;
    } catch (error) {
      log.error('Failed to save game', { gameId, error });
      return false;
    }
  }

  async getGame(gameId: string): Promise<Game | null> {
    if (!this.backend.isReady()) {
      log.warn('Snapshot storage not connected, skipping lookup', { gameId });
      return null;
    }

    try {
      const data = await this.backend.get(`${GAME_KEY_PREFIX}${gameId}`);
      if (data === null) return null;

      const snapshot: unknown = JSON.parse(data);
      return Game.fromState(snapshot);
    } catch (error) {
      log.error('Failed to load game', { gameId, error });
      return null;
    }
  }

  async deleteGame(gameId: string): Promise<void> {
    if (!this.backend.isReady()) return;

    try {
      await this.backend.del(`${GAME_KEY_PREFIX}${gameId}`);
      await this.backend.removeMember(ACTIVE_GAMES_KEY, gameId);
    } catch (error) {
      log.error('Failed to delete game', { gameId, error });
    }
  }

  async getAllGameIds(): Promise<string[]> {
    if (!this.backend.isReady()) {
      log.warn('Snapshot storage not connected, cannot list games');
      return [];
    }

    try {
      return await this.backend.members(ACTIVE_GAMES_KEY);
    } catch (error) {
      log.error('Failed to list stored games', { error });
      return [];
    }
  }

  async disconnect(): Promise<void> {
    try {
      await this.backend.disconnect();
    } catch (error) {
      log.error('Failed to disconnect snapshot storage', { error });
    }
  }
}

export const gameCache = new GameCache();
