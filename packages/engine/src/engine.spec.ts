import { strict as assert } from "assert";
import { GameConfig, GameState, Action, Observation, Outcome } from "@pegcross/core";
import { GameRegistry } from "./GameRegistry";
import { GameSession } from "./GameSession";
import { IGameModule } from "./interfaces/IGameModule";

// Minimal countdown puzzle inlined for testing: subtract one or two from
// the counter until it reaches zero, in as few moves as possible.
function remainingOf(state: GameState): number {
  const remaining = state.data.remaining;
  if (typeof remaining !== "number") throw new Error("missing remaining");
  return remaining;
}

function stepOf(action: Action): number | null {
  const by = action.data.by;
  return action.type === "step" && (by === 1 || by === 2) ? by : null;
}

const TestCountdown: IGameModule = {
  gameId: "countdown",
  name: "Countdown",
  description: "Test puzzle",

  init(config: GameConfig): GameState {
    const start = config.settings?.start;
    return {
      gameId: "countdown",
      moveNumber: 0,
      data: { remaining: typeof start === "number" ? start : 5 },
    };
  },

  validateAction(state: GameState, action: Action): boolean {
    const by = stepOf(action);
    return by !== null && by <= remainingOf(state);
  },

  applyAction(state: GameState, action: Action): GameState {
    return {
      ...state,
      moveNumber: state.moveNumber + 1,
      data: { remaining: remainingOf(state) - (stepOf(action) ?? 0) },
    };
  },

  isTerminal(state: GameState): boolean {
    return remainingOf(state) === 0;
  },

  getOutcome(state: GameState): Outcome {
    const solved = remainingOf(state) === 0;
    return {
      solved,
      score: solved ? state.moveNumber : 0,
      reason: solved ? "reached_zero" : "in_progress",
    };
  },

  getObservation(state: GameState): Observation {
    return {
      gameId: state.gameId,
      moveNumber: state.moveNumber,
      publicData: { ...state.data },
    };
  },

  getLegalActions(state: GameState): Action[] {
    const actions: Action[] = [];
    for (let by = 1; by <= Math.min(2, remainingOf(state)); by++) {
      actions.push({ type: "step", data: { by } });
    }
    return actions;
  },
};

function step(n: number): Action {
  return { type: "step", data: { by: n } };
}

describe("GameRegistry", () => {
  it("should list registered games", () => {
    const registry = new GameRegistry();
    registry.register(TestCountdown);
    assert.deepEqual(registry.list(), [TestCountdown]);
  });

  it("should reject duplicate registrations", () => {
    const registry = new GameRegistry();
    registry.register(TestCountdown);
    assert.throws(() => registry.register(TestCountdown), /already registered: countdown/);
  });
});

describe("GameSession", () => {
  it("should play a puzzle to the end", () => {
    const session = new GameSession({ game: TestCountdown });

    assert.equal(session.isTerminal(), false);

    // 5 -> 3 -> 2 -> 0
    assert.equal(session.submitAction(step(2)).terminal, false);
    assert.equal(session.submitAction(step(1)).terminal, false);
    const result = session.submitAction(step(2));

    assert.equal(result.terminal, true);
    assert.deepEqual(result.outcome, { solved: true, score: 3, reason: "reached_zero" });
    assert.equal(session.isTerminal(), true);
    assert.equal(session.getState().moveNumber, 3);
  });

  it("should pass settings to the game", () => {
    const session = new GameSession({ game: TestCountdown, settings: { start: 1 } });
    assert.equal(session.submitAction(step(1)).terminal, true);
  });

  it("should reject invalid actions", () => {
    const session = new GameSession({ game: TestCountdown, settings: { start: 2 } });

    assert.throws(() => session.submitAction({ type: "invalid", data: {} }), /Invalid action/);
    assert.throws(() => session.submitAction(step(3)), /Invalid action/);
    assert.equal(session.getState().moveNumber, 0);
  });

  it("should reject moves after the puzzle is over", () => {
    const session = new GameSession({ game: TestCountdown, settings: { start: 2 } });
    session.submitAction(step(2));
    assert.throws(() => session.submitAction(step(1)), /Game is already over/);
  });

  it("should provide observations and legal actions", () => {
    const session = new GameSession({ game: TestCountdown });
    session.submitAction(step(1));

    const obs = session.getObservation();
    assert.equal(obs.moveNumber, 1);
    assert.equal(obs.publicData.remaining, 4);
    assert.deepEqual(session.getLegalActions(), [step(1), step(2)]);
    assert.deepEqual(session.getOutcome(), { solved: false, score: 0, reason: "in_progress" });
  });
});
