import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { createGameRegistry } from "./registry";
import { registerConfigCommand } from "./commands/config";
import { registerSolveCommand } from "./commands/solve";
import { registerPlayCommand } from "./commands/play";
import log from "./logger";

program
  .name("pegcross")
  .description("Peg solitaire solver for the cross board")
  .version("0.1.0", "-v, --version");

registerSolveCommand(program);
registerPlayCommand(program);
registerConfigCommand(program);

program
  .command("games")
  .description("List available games")
  .action(() => {
    console.log("\nAvailable Games:");
    console.log("────────────────");
    for (const game of createGameRegistry().list()) {
      console.log(`  ${game.name} (${game.gameId})`);
      console.log(`    ${game.description}`);
      console.log("");
    }
  });

program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  log.debug({ err }, "Command failed");
  console.error(`Error: ${message}`);
  process.exit(1);
});
