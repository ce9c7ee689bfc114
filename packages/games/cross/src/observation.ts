import { GameState, Observation } from "@pegcross/core";
import { cloneCells, countCells } from "./layout";
import { readCrossData } from "./state";

/**
 * Peg solitaire has no hidden information: the player sees the whole
 * board, the move history and the peg count.
 */
export function observe(state: GameState): Observation {
  const data = readCrossData(state);

  return {
    gameId: state.gameId,
    moveNumber: state.moveNumber,
    publicData: {
      cells: cloneCells(data.cells),
      moves: data.moves.map((m) => ({ from: { ...m.from }, to: { ...m.to } })),
      pegs: countCells(data.cells, "occupied"),
      resigned: data.resigned,
    },
  };
}
