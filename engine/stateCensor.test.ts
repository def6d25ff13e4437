import { describe, expect, it } from 'vitest';
import { Game } from './game';
import { censorGameState } from './stateCensor';
import { grant } from './testHelpers';

function gameWithHands(): Game {
  const game = new Game(['Ash', 'Bea'], { seed: 12 });
  grant(game, 0, { timber: 2, iron: 1 });
  grant(game, 1, { grain: 4 });
  game.players[1].developmentCards.push('knight', 'monopoly');
  game.players[1].newDevelopmentCards.push('monopoly');
  return game;
}

describe('censorGameState', () => {
  it('shows the viewer their own hand', () => {
    const view = censorGameState(gameWithHands().getState(), 1);
    const own = view.players[1];

    expect(own.resources).toEqual({ timber: 0, stone: 0, meat: 0, grain: 4, iron: 0 });
    expect(own.developmentCards).toEqual(['knight', 'monopoly']);
    expect(own.newDevelopmentCards).toEqual(['monopoly']);
    expect(own.resourceCount).toBe(4);
    expect(own.developmentCardCount).toBe(2);
  });

  it('reduces opponents to counts', () => {
    const view = censorGameState(gameWithHands().getState(), 0);
    const opponent = view.players[1];

    expect(opponent.resources).toBeNull();
    expect(opponent.developmentCards).toBeNull();
    expect(opponent.newDevelopmentCards).toBeNull();
    expect(opponent.resourceCount).toBe(4);
    expect(opponent.developmentCardCount).toBe(2);
    expect(opponent.name).toBe('Bea');
  });

  it('hides the draw pile and the random stream', () => {
    const view = censorGameState(gameWithHands().getState(), 0);

    expect(view.developmentDeckSize).toBe(25);
    expect('developmentDeck' in view).toBe(false);
    expect('rngState' in view).toBe(false);
    expect('seed' in view).toBe(false);
    expect(view.board.hexes).toHaveLength(19);
  });

  it('hides every hand from a spectator', () => {
    const view = censorGameState(gameWithHands().getState(), null);
    expect(view.players.map(p => p.resources)).toEqual([null, null]);
    expect(view.players.map(p => p.resourceCount)).toEqual([3, 4]);
  });

  it('leaves hidden victory-point cards out of opponents\' points', () => {
    const game = gameWithHands();
    game.players[1].developmentCards.push('victoryPoint');
    game.players[1].victoryPoints = 3;

    expect(censorGameState(game.getState(), 0).players[1].victoryPoints).toBe(2);
    expect(censorGameState(game.getState(), 1).players[1].victoryPoints).toBe(3);
    expect(censorGameState(game.getState(), null).players[1].victoryPoints).toBe(2);
  });

  it('shows every hand once the game is over', () => {
    const game = gameWithHands();
    game.players[1].developmentCards.push('victoryPoint');
    game.players[1].victoryPoints = 3;
    game.gameOver = true;

    const opponent = censorGameState(game.getState(), 0).players[1];
    expect(opponent.victoryPoints).toBe(3);
    expect(opponent.resources).toEqual({ timber: 0, stone: 0, meat: 0, grain: 4, iron: 0 });
  });

  it('backs Game.getStateForPlayer', () => {
    const game = gameWithHands();
    expect(game.getStateForPlayer(1)).toEqual(censorGameState(game.getState(), 1));
  });
});
