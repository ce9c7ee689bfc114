import { GameState } from "@pegcross/core";
import { Location } from "./geometry";
import { Move } from "./move";
import { CellGrid, isCellGrid } from "./layout";
import { Board, BoardRules } from "./board";

/** The game-specific data stored in GameState.data */
export type CrossData = {
  /** Starting layout; fixes the off mask for the whole game */
  layout: CellGrid;
  /** Current occupancy */
  cells: CellGrid;
  /** Jumps played so far, oldest first */
  moves: Move[];
  /** Whether the player has resigned */
  resigned: boolean;
};

function isLocation(value: unknown): value is Location {
  return (
    typeof value === "object" &&
    value !== null &&
    "row" in value &&
    "col" in value &&
    Number.isInteger(value.row) &&
    Number.isInteger(value.col)
  );
}

export function isMove(value: unknown): value is Move {
  return (
    typeof value === "object" &&
    value !== null &&
    "from" in value &&
    "to" in value &&
    isLocation(value.from) &&
    isLocation(value.to)
  );
}

export function isCrossData(value: unknown): value is CrossData {
  return (
    typeof value === "object" &&
    value !== null &&
    "layout" in value &&
    "cells" in value &&
    "moves" in value &&
    "resigned" in value &&
    isCellGrid(value.layout) &&
    isCellGrid(value.cells) &&
    value.cells.length === value.layout.length &&
    Array.isArray(value.moves) &&
    value.moves.every(isMove) &&
    typeof value.resigned === "boolean"
  );
}

export function readCrossData(state: GameState): CrossData {
  if (!isCrossData(state.data)) {
    throw new Error(`Malformed state data for game "${state.gameId}"`);
  }
  return state.data;
}

/** Board for interactive play: no depth cap. */
export function boardFromData(data: CrossData): Board {
  return new BoardRules(data.layout, Infinity).createBoard(data.cells, data.moves);
}
