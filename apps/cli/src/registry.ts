import { GameRegistry } from "@pegcross/engine";
import { CrossSolitaireModule } from "@pegcross/game-cross";

export function createGameRegistry(): GameRegistry {
  const registry = new GameRegistry();
  registry.register(CrossSolitaireModule);
  return registry;
}
