export { GameRegistry } from "./GameRegistry";
export { GameSession } from "./GameSession";
export type { GameSessionOptions, SubmitResult } from "./GameSession";
export type { IGameModule, GameUISpec } from "./interfaces/IGameModule";
