import { strict as assert } from "assert";
import { GameSession } from "@pegcross/engine";
import { CrossSolitaireModule } from "@pegcross/game-cross";
import { setLogLevel } from "../logger";
import { Prompter } from "./prompt";
import { findHint, runPlay } from "./play";

function scripted(answers: string[]): Prompter {
  const queue = [...answers];
  return {
    ask: () => Promise.resolve(queue.length > 0 ? queue.shift() ?? null : null),
    close: () => undefined,
  };
}

function newSession(layout?: string[]): GameSession {
  return new GameSession({
    game: CrossSolitaireModule,
    settings: layout ? { layout } : undefined,
  });
}

describe("runPlay", () => {
  before(() => setLogLevel("warn"));
  after(() => setLogLevel("info"));

  it("suggests the first jump the search finds", () => {
    assert.equal(findHint(newSession()), "(1,3)->(3,3)");
    assert.equal(findHint(newSession(["...", "101", "..."])), null);
  });

  it("handles hints, bad input and quitting", async () => {
    const session = newSession();
    const lines: string[] = [];
    await runPlay(session, scripted(["hint", "1 3 down", "9 9 up", "blah", "quit"]), (l) => lines.push(l));

    assert.ok(lines.includes("Try (1,3)->(3,3)"));
    assert.ok(lines.includes("Error: Invalid action"));
    assert.ok(lines.includes('Could not read "blah".'));
    assert.equal(lines[lines.length - 1], "Bye.");
    assert.equal(session.getState().moveNumber, 1);
  });

  it("lists the legal jumps on request", async () => {
    const lines: string[] = [];
    await runPlay(newSession(), scripted(["moves", "quit"]), (l) => lines.push(l));
    assert.ok(lines.includes("Legal jumps: (1,3)->(3,3), (3,1)->(3,3), (3,5)->(3,3), (5,3)->(3,3)"));
  });

  it("stops when input ends", async () => {
    const lines: string[] = [];
    await runPlay(newSession(), scripted([]), (l) => lines.push(l));
    assert.equal(lines[lines.length - 1], "Bye.");
  });

  it("reports the outcome when the puzzle is finished", async () => {
    const lines: string[] = [];
    await runPlay(newSession(["...", "110", "..."]), scripted(["1 0 right"]), (l) => lines.push(l));
    assert.equal(lines[lines.length - 1], "Game over (solved). Pegs removed: 1");
  });
});
