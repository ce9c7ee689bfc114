/** A cell on the board, addressed by 0-based row and column. */
export interface Location {
  readonly row: number;
  readonly col: number;
}

export function loc(row: number, col: number): Location {
  return { row, col };
}

export function addLocations(a: Location, b: Location): Location {
  return { row: a.row + b.row, col: a.col + b.col };
}

export function locationsEqual(a: Location, b: Location): boolean {
  return a.row === b.row && a.col === b.col;
}

/** Row-major strict order: `a` comes before `b`. */
export function isBefore(a: Location, b: Location): boolean {
  return a.row < b.row || (a.row === b.row && a.col < b.col);
}

/** Comparator for Array.prototype.sort, row-major. */
export function compareLocations(a: Location, b: Location): number {
  return a.row !== b.row ? a.row - b.row : a.col - b.col;
}

export function minLocation(a: Location, b: Location): Location {
  return isBefore(b, a) ? b : a;
}

export function formatLocation(v: Location): string {
  return `(${v.row},${v.col})`;
}
