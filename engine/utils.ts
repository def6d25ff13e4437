import { Coordinate, HexCoordinate } from './types';

/** Decimal places kept when corners are turned into lookup keys. */
export const COORDINATE_PRECISION = 3;

/**
 * Generates a unique string key for a coordinate that can be used in Maps/Sets.
 * Rounding goes through parseFloat so that -0 and 0 produce the same key.
 */
export function coordinateToKey(coord: Coordinate): string {
  const x = parseFloat(coord.x.toFixed(COORDINATE_PRECISION));
  const y = parseFloat(coord.y.toFixed(COORDINATE_PRECISION));
  return `${x},${y}`;
}

export function hexKey(coord: HexCoordinate): string {
  return `${coord.q},${coord.r}`;
}

/** Removes one occurrence of `item`; returns false when it is not present. */
export function removeOne<T>(items: T[], item: T): boolean {
  const index = items.indexOf(item);
  if (index === -1) return false;
  items.splice(index, 1);
  return true;
}

export function pushUnique<T>(items: T[], item: T): void {
  if (!items.includes(item)) items.push(item);
}
