import { GameState, Action, Outcome, Observation } from "@pegcross/core";
import { IGameModule } from "./interfaces/IGameModule";

export interface GameSessionOptions {
  game: IGameModule;
  settings?: Record<string, unknown>;
}

export interface SubmitResult {
  observation: Observation;
  terminal: boolean;
  outcome?: Outcome;
}

/**
 * Drives one puzzle: validates each action and swaps in the state the
 * game module returns for it.
 */
export class GameSession {
  private game: IGameModule;
  private state: GameState;

  constructor(opts: GameSessionOptions) {
    this.game = opts.game;
    this.state = opts.game.init({
      gameId: opts.game.gameId,
      version: "0.1.0",
      settings: opts.settings,
    });
  }

  getState(): GameState {
    return this.state;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): Outcome {
    return this.game.getOutcome(this.state);
  }

  getObservation(): Observation {
    return this.game.getObservation(this.state);
  }

  getLegalActions(): Action[] {
    return this.game.getLegalActions(this.state);
  }

  /**
   * Apply an action. Throws if the game is over or the action is invalid.
   */
  submitAction(action: Action): SubmitResult {
    if (this.isTerminal()) {
      throw new Error("Game is already over");
    }
    if (!this.game.validateAction(this.state, action)) {
      throw new Error("Invalid action");
    }

    this.state = this.game.applyAction(this.state, action);

    const terminal = this.game.isTerminal(this.state);
    return {
      observation: this.game.getObservation(this.state),
      terminal,
      outcome: terminal ? this.game.getOutcome(this.state) : undefined,
    };
  }
}
