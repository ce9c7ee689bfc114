import { Location, addLocations, formatLocation } from "./geometry";

export type Direction = "right" | "up" | "left" | "down";

/** Directions in the order moves are generated. */
export const DIRECTIONS: readonly Direction[] = ["right", "up", "left", "down"];

/** A jump always travels exactly two cells. */
export const DISPLACEMENTS: Readonly<Record<Direction, Location>> = {
  right: { row: 0, col: 2 },
  up: { row: -2, col: 0 },
  left: { row: 0, col: -2 },
  down: { row: 2, col: 0 },
};

/**
 * A peg jumping from `from` over the skipped cell to `to`. Nothing is
 * checked here; legality depends on the board (see Board.isMovePossible).
 */
export interface Move {
  readonly from: Location;
  readonly to: Location;
}

export function createMove(from: Location, to: Location): Move {
  return { from, to };
}

export function moveInDirection(from: Location, direction: Direction): Move {
  return { from, to: addLocations(from, DISPLACEMENTS[direction]) };
}

export function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && DIRECTIONS.some((d) => d === value);
}

/** The captured cell: midpoint of `from` and `to`. */
export function skippedLocation(move: Move): Location {
  return {
    row: Math.trunc((move.from.row + move.to.row) / 2),
    col: Math.trunc((move.from.col + move.to.col) / 2),
  };
}

/** Inverse of DISPLACEMENTS, or null when `move` is not a straight two-cell jump. */
export function directionOf(move: Move): Direction | null {
  const dr = move.to.row - move.from.row;
  const dc = move.to.col - move.from.col;
  for (const direction of DIRECTIONS) {
    const d = DISPLACEMENTS[direction];
    if (d.row === dr && d.col === dc) return direction;
  }
  return null;
}

export function formatMove(move: Move): string {
  return `${formatLocation(move.from)}->${formatLocation(move.to)}`;
}
