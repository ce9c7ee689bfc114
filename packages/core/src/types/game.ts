export interface GameConfig {
  gameId: string;
  version: string;
  /** Game-specific options (e.g. `{ layout: "english" }`) */
  settings?: Record<string, unknown>;
}

/**
 * State of a puzzle in progress. `data` belongs to the game module and is
 * opaque to everything else.
 */
export interface GameState {
  gameId: string;
  /** Number of actions applied since init */
  moveNumber: number;
  data: Record<string, unknown>;
}

export interface Action {
  type: string;
  data: Record<string, unknown>;
}

export interface Outcome {
  solved: boolean;
  score: number;
  reason: string;
}

export interface Observation {
  gameId: string;
  moveNumber: number;
  publicData: Record<string, unknown>;
}
