import { Command } from "commander";
import {
  Board,
  BoardRules,
  Move,
  MoveCounter,
  formatBoard,
  playMoves,
} from "@pegcross/game-cross";
import { initConfig, setCliOverride, toSolveSettings, SolveSettings } from "../config";
import log from "../logger";

export interface SolveResult {
  moves: readonly Move[];
  boards: Board[];
  movesApplied: number;
  elapsedMs: number;
}

interface SolveCliOptions {
  depth?: string;
  layout?: string;
  earlyExit?: boolean;
  progressEvery?: string;
}

/**
 * Search for the longest move sequence, then print every board along it
 * followed by the elapsed time.
 */
export function runSolve(
  settings: SolveSettings,
  print: (line: string) => void = console.log,
): SolveResult {
  const counter = new MoveCounter(
    (movesApplied) => log.info({ movesApplied }, "Search progress"),
    settings.progressEvery,
  );
  const start = new BoardRules(settings.layout, settings.maxDepth).createInitialBoard();

  log.debug(
    { layout: settings.layoutName, depth: settings.maxDepth, earlyExit: settings.earlyExit, pegs: start.countPegs() },
    "Starting search",
  );
  const startTime = Date.now();
  const moves = start.getBestMoveList({ counter, earlyExit: settings.earlyExit });
  const boards = playMoves(start, moves);
  const elapsedMs = Date.now() - startTime;
  log.info({ moves: moves.length, movesApplied: counter.value, ms: elapsedMs }, "Search finished");

  boards.forEach((board, i) => {
    if (i > 0) print("");
    print(formatBoard(board));
  });
  print("");
  print(`Elapsed: ${elapsedMs} ms`);

  return { moves, boards, movesApplied: counter.value, elapsedMs };
}

export function registerSolveCommand(program: Command): void {
  program
    .command("solve")
    .description("Find the longest jump sequence within the depth cap")
    .option("-d, --depth <N>", "Maximum number of moves to search")
    .option("-l, --layout <name|path>", "Built-in layout name or layout file")
    .option("--early-exit", "Stop exploring siblings once the depth cap is reached")
    .option("--progress-every <N>", "Log progress every N move applications")
    .action(async (opts: SolveCliOptions) => {
      if (opts.depth !== undefined) setCliOverride("maxDepth", opts.depth);
      if (opts.layout !== undefined) setCliOverride("layout", opts.layout);
      if (opts.earlyExit) setCliOverride("earlyExit", "true");
      if (opts.progressEvery !== undefined) setCliOverride("progressEvery", opts.progressEvery);

      const config = await initConfig();
      runSolve(await toSolveSettings(config));
    });
}
