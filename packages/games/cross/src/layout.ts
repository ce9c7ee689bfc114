export type CellState = "off" | "empty" | "occupied";

/** Square grid of cell states, indexed `[row][col]`. */
export type CellGrid = CellState[][];

/** The classic 33-hole cross with the centre hole empty. */
export const ENGLISH_LAYOUT: readonly string[] = [
  "  111  ",
  "  111  ",
  "1111111",
  "1110111",
  "1111111",
  "  111  ",
  "  111  ",
];

export const BUILTIN_LAYOUTS: Readonly<Record<string, readonly string[]>> = {
  english: ENGLISH_LAYOUT,
};

export const DEFAULT_LAYOUT = "english";

function parseCell(ch: string, row: number, col: number): CellState {
  switch (ch) {
    case " ":
    case ".":
      return "off";
    case "0":
      return "empty";
    case "1":
      return "occupied";
    default:
      throw new Error(
        `Invalid layout character "${ch}" at row ${row}, column ${col}. Use "1", "0", "." or space.`
      );
  }
}

/**
 * Parse a layout from row strings ("1" peg, "0" hole, "." or " " off).
 * Short rows are padded with off cells; the result must be square.
 */
export function parseLayout(rows: readonly string[]): CellGrid {
  // Trailing blank lines from text files are not rows.
  const trimmed = [...rows];
  while (trimmed.length > 0 && trimmed[trimmed.length - 1].trim() === "") {
    trimmed.pop();
  }
  if (trimmed.length === 0) {
    throw new Error("Layout is empty");
  }

  const size = trimmed.length;
  return trimmed.map((line, r) => {
    if (line.length > size) {
      throw new Error(
        `Layout must be square: row ${r} has ${line.length} cells, expected at most ${size}`
      );
    }
    return Array.from({ length: size }, (_, c) =>
      c < line.length ? parseCell(line[c], r, c) : "off"
    );
  });
}

export function parseLayoutText(text: string): CellGrid {
  return parseLayout(text.replace(/\r/g, "").split("\n"));
}

/** Look up a built-in layout by name, or null if there is none. */
export function getBuiltinLayout(name: string): CellGrid | null {
  if (!Object.hasOwn(BUILTIN_LAYOUTS, name)) return null;
  return parseLayout(BUILTIN_LAYOUTS[name]);
}

export function cloneCells(cells: CellGrid): CellGrid {
  return cells.map((row) => [...row]);
}

export function countCells(cells: CellGrid, state: CellState): number {
  let n = 0;
  for (const row of cells) {
    for (const cell of row) {
      if (cell === state) n++;
    }
  }
  return n;
}

export function isCellState(value: unknown): value is CellState {
  return value === "off" || value === "empty" || value === "occupied";
}

export function isCellGrid(value: unknown): value is CellGrid {
  if (!Array.isArray(value)) return false;
  const size = value.length;
  return size > 0 && value.every(
    (row) => Array.isArray(row) && row.length === size && row.every(isCellState)
  );
}
