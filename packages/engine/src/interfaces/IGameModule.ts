import { GameConfig, GameState, Action, Outcome, Observation } from "@pegcross/core";

/**
 * Rendering and input hooks a game ships so the CLI can drive it
 * without per-game code.
 */
export interface GameUISpec {
  /** Shown before each prompt (e.g. 'Enter "R C DIR"') */
  inputHint: string;

  renderBoard(publicData: Record<string, unknown>): string;

  /** One-line status, or null if there is nothing to say. */
  renderStatus(publicData: Record<string, unknown>): string | null;

  /** Parse a typed line into an Action, or null if it can't be read. */
  parseInput(raw: string, publicData: Record<string, unknown>): Action | null;

  formatAction(action: Action): string;
}

/**
 * A single-player puzzle. `applyAction` returns a new state and leaves
 * the old one untouched.
 */
export interface IGameModule {
  /** Unique identifier (e.g. "cross") */
  readonly gameId: string;
  readonly name: string;
  readonly description: string;
  readonly ui?: GameUISpec;

  init(config: GameConfig): GameState;
  validateAction(state: GameState, action: Action): boolean;
  applyAction(state: GameState, action: Action): GameState;
  isTerminal(state: GameState): boolean;
  getOutcome(state: GameState): Outcome;
  getObservation(state: GameState): Observation;
  getLegalActions(state: GameState): Action[];
}
