import { DevelopmentCardType, GameState, PlayerId, PlayerState, Resources } from './types';

export interface PlayerView extends Omit<PlayerState, 'resources' | 'developmentCards' | 'newDevelopmentCards'> {
  /** `null` for opponents; only the viewer sees their own breakdown. */
  resources: Resources | null;
  developmentCards: DevelopmentCardType[] | null;
  newDevelopmentCards: DevelopmentCardType[] | null;
  resourceCount: number;
  developmentCardCount: number;
}

export interface GameView extends Omit<GameState, 'players' | 'developmentDeck' | 'rngState' | 'seed'> {
  players: PlayerView[];
  developmentDeckSize: number;
}

function countCards(resources: Resources): number {
  return resources.timber + resources.stone + resources.meat + resources.grain + resources.iron;
}

/** Points from buildings and awards, leaving out victory-point cards still in hand. */
function publicVictoryPoints(player: PlayerState): number {
  return player.victoryPoints - player.developmentCards.filter(card => card === 'victoryPoint').length;
}

function censorPlayer(player: PlayerState, visible: boolean): PlayerView {
  return {
    ...player,
    victoryPoints: visible ? player.victoryPoints : publicVictoryPoints(player),
    resources: visible ? { ...player.resources } : null,
    developmentCards: visible ? [...player.developmentCards] : null,
    newDevelopmentCards: visible ? [...player.newDevelopmentCards] : null,
    resourceCount: countCards(player.resources),
    developmentCardCount: player.developmentCards.length
  };
}

/**
 * Creates a player-specific view of the game state.
 *
 * Hidden from the viewer:
 * - other players' resource breakdowns (the total stays visible)
 * - other players' development cards (the count stays visible)
 * - the victory-point cards inside other players' point totals
 * - the draw pile order, the seed and the random stream state
 *
 * Pass `null` for a spectator view that hides every hand. Once the game is
 * over every hand is shown.
 */
export function censorGameState(state: GameState, viewerId: PlayerId | null): GameView {
  const { players, developmentDeck, rngState: _rngState, seed: _seed, ...shared } = state;

  return {
    ...shared,
    players: players.map(player => censorPlayer(player, shared.gameOver || player.id === viewerId)),
    developmentDeckSize: developmentDeck.length
  };
}
