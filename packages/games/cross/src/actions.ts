import { Action, GameState } from "@pegcross/core";
import { Direction, Move, directionOf, isDirection } from "./move";
import { readCrossData, boardFromData } from "./state";

/** Jump the peg at (row, col) two cells in `direction` */
export interface JumpAction extends Action {
  type: "jump";
  data: { row: number; col: number; direction: Direction };
}

/** Resign action */
export interface ResignAction extends Action {
  type: "resign";
  data: Record<string, unknown>;
}

export function isJumpAction(action: Action): action is JumpAction {
  return (
    action.type === "jump" &&
    Number.isInteger(action.data.row) &&
    Number.isInteger(action.data.col) &&
    isDirection(action.data.direction)
  );
}

export function isResignAction(action: Action): action is ResignAction {
  return action.type === "resign";
}

export function jumpActionFromMove(move: Move): JumpAction | null {
  const direction = directionOf(move);
  if (direction === null) return null;
  return {
    type: "jump",
    data: { row: move.from.row, col: move.from.col, direction },
  };
}

/** Every legal jump, then resign. Nothing once the player has resigned. */
export function listLegalActions(state: GameState): Action[] {
  const data = readCrossData(state);
  if (data.resigned) return [];

  const actions: Action[] = [];
  for (const move of boardFromData(data).getLegalMoves()) {
    const action = jumpActionFromMove(move);
    if (action) actions.push(action);
  }

  actions.push({ type: "resign", data: {} });
  return actions;
}
