import { describe, expect, it } from 'vitest';
import { createSnapshotBackend, GameCache, MemorySnapshotBackend } from './cache';
import { Game } from './game';
import { autoInitialSetup } from './setup';

class FailingBackend extends MemorySnapshotBackend {
  override async set(): Promise<void> {
    throw new Error('write refused');
  }
}

function sampleGame(): Game {
  const game = new Game(['Ash', 'Bea'], { seed: 31 });
  autoInitialSetup(game);
  game.rollForTurn(0);
  return game;
}

describe('GameCache', () => {
  it('does nothing before it is connected', async () => {
    const cache = new GameCache(new MemorySnapshotBackend(), 60);

    expect(await cache.saveGame('g1', sampleGame())).toBe(false);
    expect(await cache.getGame('g1')).toBeNull();
    expect(await cache.getAllGameIds()).toEqual([]);
  });

  it('saves, lists, loads and deletes games', async () => {
    const cache = new GameCache(new MemorySnapshotBackend(), 60);
    await cache.connect();
    const game = sampleGame();

    expect(await cache.saveGame('g1', game)).toBe(true);
    expect(await cache.getAllGameIds()).toEqual(['g1']);

    const loaded = await cache.getGame('g1');
    expect(loaded?.getState()).toEqual(game.getState());

    await cache.deleteGame('g1');
    expect(await cache.getGame('g1')).toBeNull();
    expect(await cache.getAllGameIds()).toEqual([]);
    await cache.disconnect();
  });

  it('expires snapshots after the TTL', async () => {
    let now = 1000;
    const cache = new GameCache(new MemorySnapshotBackend(() => now), 60);
    await cache.connect();
    await cache.saveGame('g1', sampleGame());

    now += 59_999;
    expect(await cache.getGame('g1')).not.toBeNull();
    now += 1;
    expect(await cache.getGame('g1')).toBeNull();
  });

  it('treats unreadable snapshots as missing', async () => {
    const backend = new MemorySnapshotBackend();
    const cache = new GameCache(backend, 60);
    await cache.connect();
    await backend.set('game:broken', '{not json', 60);
    await backend.set('game:invalid', JSON.stringify({ seed: 'x' }), 60);

    expect(await cache.getGame('broken')).toBeNull();
    expect(await cache.getGame('invalid')).toBeNull();
  });

  it('reports a failed write', async () => {
    const cache = new GameCache(new FailingBackend(), 60);
    await cache.connect();
    expect(await cache.saveGame('g1', sampleGame())).toBe(false);
  });
});

describe('createSnapshotBackend', () => {
  it('uses memory without a Redis URL', () => {
    expect(createSnapshotBackend(null).name).toBe('memory');
  });

  it('uses Redis when a URL is given', () => {
    expect(createSnapshotBackend('redis://localhost:6379').name).toBe('redis');
  });
});
