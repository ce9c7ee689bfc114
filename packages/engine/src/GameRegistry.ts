import { IGameModule } from "./interfaces/IGameModule";

/**
 * In-memory registry of available game modules.
 */
export class GameRegistry {
  private games = new Map<string, IGameModule>();

  register(game: IGameModule): void {
    if (this.games.has(game.gameId)) {
      throw new Error(`Game already registered: ${game.gameId}`);
    }
    this.games.set(game.gameId, game);
  }

  list(): IGameModule[] {
    return Array.from(this.games.values());
  }
}
