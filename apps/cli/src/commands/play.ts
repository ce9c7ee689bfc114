import { Command } from "commander";
import { GameSession } from "@pegcross/engine";
import {
  BoardRules,
  CrossSolitaireModule,
  formatMove,
  readCrossData,
} from "@pegcross/game-cross";
import { initConfig, setCliOverride, loadLayout } from "../config";
import { createPrompter, Prompter } from "./prompt";
import log from "../logger";

// Moves looked ahead by "hint"
const HINT_DEPTH = 4;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Best next jump from the current position, searching HINT_DEPTH moves ahead. */
export function findHint(session: GameSession): string | null {
  const data = readCrossData(session.getState());
  const rules = new BoardRules(data.layout, data.moves.length + HINT_DEPTH);
  const best = rules
    .createBoard(data.cells, data.moves)
    .getBestMoveList({ earlyExit: true });
  const next = best[data.moves.length];
  return next ? formatMove(next) : null;
}

export async function runPlay(
  session: GameSession,
  prompter: Prompter,
  print: (line: string) => void = console.log,
): Promise<void> {
  const ui = CrossSolitaireModule.ui;
  if (!ui) throw new Error("Game has no UI spec");

  while (!session.isTerminal()) {
    const obs = session.getObservation();
    print("");
    print(ui.renderBoard(obs.publicData));
    const status = ui.renderStatus(obs.publicData);
    if (status) print(status);
    print(`${ui.inputHint}; "moves", "hint" or "quit"`);

    const raw = await prompter.ask("> ");
    if (raw === null || raw.trim().toLowerCase() === "quit") {
      print("Bye.");
      return;
    }

    if (raw.trim().toLowerCase() === "moves") {
      const jumps = session
        .getLegalActions()
        .filter((action) => action.type === "jump")
        .map((action) => ui.formatAction(action));
      print(`Legal jumps: ${jumps.join(", ")}`);
      continue;
    }

    if (raw.trim().toLowerCase() === "hint") {
      const hint = findHint(session);
      print(hint ? `Try ${hint}` : "No jump keeps going from here.");
      continue;
    }

    const action = ui.parseInput(raw, obs.publicData);
    if (!action) {
      print(`Could not read "${raw.trim()}".`);
      continue;
    }

    try {
      session.submitAction(action);
      log.debug({ action: ui.formatAction(action) }, "Move played");
    } catch (err) {
      print(`Error: ${errorMessage(err)}`);
    }
  }

  const obs = session.getObservation();
  print("");
  print(ui.renderBoard(obs.publicData));
  const outcome = session.getOutcome();
  print(`Game over (${outcome.reason}). Pegs removed: ${outcome.score}`);
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play the puzzle interactively")
    .option("-l, --layout <name|path>", "Built-in layout name or layout file")
    .action(async (opts: { layout?: string }) => {
      if (opts.layout !== undefined) setCliOverride("layout", opts.layout);
      const config = await initConfig();

      const session = new GameSession({
        game: CrossSolitaireModule,
        settings: { layout: await loadLayout(config.layout) },
      });

      const prompter = createPrompter();
      try {
        await runPlay(session, prompter);
      } finally {
        prompter.close();
      }
    });
}
