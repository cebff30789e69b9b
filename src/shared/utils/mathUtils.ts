/**
 * Shared math utilities for tile-grid distances.
 *
 * Ranges are Chebyshev distances (diagonal steps count as one), matching how
 * the host measures action ranges. Positions in different rooms are never in
 * range of each other.
 *
 * @module shared/utils/mathUtils
 */

import type { Position } from "../types/simulation/world";

/**
 * Tile range between two positions, or `Infinity` across rooms.
 */
export function getRange(a: Position, b: Position): number {
  if (a.roomName !== b.roomName) return Infinity;
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

/**
 * Checks if two positions are within `range` tiles of each other.
 */
export function isWithinRange(a: Position, b: Position, range: number): boolean {
  return getRange(a, b) <= range;
}

/**
 * Returns the item closest to `origin` by range, ignoring anything farther
 * than `maxRange`. Ties keep the earliest item.
 */
export function findClosestByRange<T extends { readonly pos: Position }>(
  origin: Position,
  items: readonly T[],
  maxRange: number = Infinity,
): T | undefined {
  let closest: T | undefined;
  let closestRange = Infinity;

  for (const item of items) {
    const range = getRange(origin, item.pos);
    if (range <= maxRange && range < closestRange) {
      closest = item;
      closestRange = range;
    }
  }

  return closest;
}
