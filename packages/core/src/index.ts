export * from "./types/game";
