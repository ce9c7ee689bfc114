import { Board } from "./board";
import { Move, formatMove } from "./move";
import { CellGrid, CellState } from "./layout";

const CELL_SYMBOLS: Record<CellState, string> = {
  off: " ",
  empty: "0",
  occupied: "1",
};

export const FROM_SYMBOL = "-";
export const TO_SYMBOL = "+";

export function formatMoveList(moves: readonly Move[]): string {
  return `[${moves.map(formatMove).join(", ")}]`;
}

/**
 * One line per row, cells separated by a space. The source and
 * destination of `lastMove` are drawn as "-" and "+".
 */
export function renderGrid(cells: CellGrid, lastMove: Move | null = null): string[] {
  return cells.map((row, r) =>
    row
      .map((cell, c) => {
        if (lastMove && lastMove.from.row === r && lastMove.from.col === c) return FROM_SYMBOL;
        if (lastMove && lastMove.to.row === r && lastMove.to.col === c) return TO_SYMBOL;
        return CELL_SYMBOLS[cell];
      })
      .join(" ")
  );
}

/** Move history on the first line, then the grid. */
export function formatBoard(board: Board): string {
  return [formatMoveList(board.movesSoFar), ...renderGrid(board.getCells(), board.lastMove)].join("\n");
}
