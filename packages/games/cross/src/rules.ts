import {
  GameConfig,
  GameState,
  Action,
  Outcome,
  Observation,
} from "@pegcross/core";
import { IGameModule } from "@pegcross/engine";
import { CrossUI } from "./ui";
import { CrossData, readCrossData, boardFromData } from "./state";
import {
  CellGrid,
  DEFAULT_LAYOUT,
  cloneCells,
  countCells,
  getBuiltinLayout,
  isCellGrid,
  parseLayout,
} from "./layout";
import { moveInDirection } from "./move";
import {
  isJumpAction,
  isResignAction,
  listLegalActions,
} from "./actions";
import { observe } from "./observation";

/**
 * Resolve the `layout` setting: a built-in name, an array of row strings,
 * or an already parsed grid.
 */
export function resolveLayoutSetting(setting: unknown): CellGrid {
  if (setting === undefined) setting = DEFAULT_LAYOUT;

  if (isCellGrid(setting)) {
    return cloneCells(setting);
  }

  if (typeof setting === "string") {
    const layout = getBuiltinLayout(setting);
    if (!layout) {
      throw new Error(`Unknown layout: ${setting}`);
    }
    return layout;
  }

  if (Array.isArray(setting) && setting.every((row) => typeof row === "string")) {
    return parseLayout(setting);
  }

  throw new Error("Invalid layout setting: expected a layout name or an array of rows");
}

function withData(state: GameState, data: CrossData): GameState {
  return {
    gameId: state.gameId,
    moveNumber: state.moveNumber + 1,
    data,
  };
}

export const CrossSolitaireModule: IGameModule = {
  gameId: "cross",
  name: "Cross Solitaire",
  description:
    "Peg solitaire on the cross-shaped board. Jump pegs over each other until one is left.",
  ui: CrossUI,

  init(config: GameConfig): GameState {
    const layout = resolveLayoutSetting(config.settings?.layout);
    const data: CrossData = {
      layout,
      cells: cloneCells(layout),
      moves: [],
      resigned: false,
    };

    return {
      gameId: config.gameId,
      moveNumber: 0,
      data,
    };
  },

  validateAction(state: GameState, action: Action): boolean {
    const data = readCrossData(state);
    if (data.resigned) return false;

    if (isResignAction(action)) return true;

    if (isJumpAction(action)) {
      const { row, col, direction } = action.data;
      const move = moveInDirection({ row, col }, direction);
      const board = boardFromData(data);
      return (
        board.rules.isLegalLocation(move.from) &&
        board.rules.isLegalLocation(move.to) &&
        board.isMovePossible(move)
      );
    }

    return false;
  },

  applyAction(state: GameState, action: Action): GameState {
    const data = readCrossData(state);

    if (isResignAction(action)) {
      return withData(state, {
        layout: cloneCells(data.layout),
        cells: cloneCells(data.cells),
        moves: [...data.moves],
        resigned: true,
      });
    }

    if (isJumpAction(action)) {
      const { row, col, direction } = action.data;
      const next = boardFromData(data).applyMove(moveInDirection({ row, col }, direction));
      return withData(state, {
        layout: cloneCells(data.layout),
        cells: next.getCells(),
        moves: [...next.movesSoFar],
        resigned: false,
      });
    }

    throw new Error("Invalid action type");
  },

  isTerminal(state: GameState): boolean {
    const data = readCrossData(state);
    if (data.resigned) return true;
    return boardFromData(data).getLegalMoves().length === 0;
  },

  getOutcome(state: GameState): Outcome {
    const data = readCrossData(state);
    const pegs = countCells(data.cells, "occupied");
    // Pegs removed so far
    const score = countCells(data.layout, "occupied") - pegs;

    if (data.resigned) {
      return { solved: false, score, reason: "resigned" };
    }
    if (pegs === 1) {
      return { solved: true, score, reason: "solved" };
    }
    if (boardFromData(data).getLegalMoves().length === 0) {
      return { solved: false, score, reason: "no_moves_left" };
    }
    return { solved: false, score, reason: "game_in_progress" };
  },

  getObservation(state: GameState): Observation {
    return observe(state);
  },

  getLegalActions(state: GameState): Action[] {
    return listLegalActions(state);
  },
};
