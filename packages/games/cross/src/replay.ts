import { Board } from "./board";
import { Move, formatMove } from "./move";
import { MoveCounter } from "./counter";

/**
 * The boards visited when playing `moves` from `start`: `start` first,
 * then one board per move. Throws if a move is not possible on the board
 * it is applied to.
 */
export function playMoves(
  start: Board,
  moves: readonly Move[],
  counter?: MoveCounter
): Board[] {
  const boards: Board[] = [start];
  let current = start;
  moves.forEach((move, i) => {
    if (!current.isMovePossible(move)) {
      throw new Error(`Move ${i + 1} (${formatMove(move)}) is not possible on the board it is applied to`);
    }
    current = current.applyMove(move, counter);
    boards.push(current);
  });
  return boards;
}
