import { Move } from "./move";
import { MoveCounter } from "./counter";

export interface SearchOptions {
  /** Shared move-application counter for progress reporting */
  counter?: MoveCounter;
  /**
   * Stop exploring a node's remaining children once a path reaching the
   * depth cap has been found below it. The returned path is the same
   * either way; only the amount of work changes.
   */
  earlyExit?: boolean;
}

/** The part of a board the search needs. */
export interface SearchNode<N extends SearchNode<N>> {
  readonly movesSoFar: readonly Move[];
  readonly maxDepth: number;
  getPossibleMoves(): Move[];
  applyMove(move: Move, counter?: MoveCounter): N;
}

/** Keeps `current` unless `candidate` is strictly longer. */
export function chooseBetterList(
  current: readonly Move[],
  candidate: readonly Move[]
): readonly Move[] {
  return candidate.length > current.length ? candidate : current;
}

/**
 * Depth-first exhaustive search for the longest move sequence reachable
 * from `node`. Among equally long sequences the first one found wins.
 */
export function findBestMoveList<N extends SearchNode<N>>(
  node: N,
  options: SearchOptions = {}
): readonly Move[] {
  let best = node.movesSoFar;
  for (const move of node.getPossibleMoves()) {
    if (options.earlyExit && best.length >= node.maxDepth) break;
    const child = node.applyMove(move, options.counter);
    best = chooseBetterList(best, findBestMoveList(child, options));
  }
  return best;
}
