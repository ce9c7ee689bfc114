export * from "./geometry";
export * from "./move";
export * from "./transformation";
export * from "./layout";
export { MoveCounter, DEFAULT_REPORT_EVERY } from "./counter";
export type { CounterReport } from "./counter";
export { chooseBetterList, findBestMoveList } from "./search";
export type { SearchOptions, SearchNode } from "./search";
export { Board, BoardRules } from "./board";
export { playMoves } from "./replay";
export { formatBoard, formatMoveList, renderGrid } from "./render";
export type { CrossData } from "./state";
export { readCrossData } from "./state";
export { CrossSolitaireModule, resolveLayoutSetting } from "./rules";
export { CrossUI } from "./ui";
export type { JumpAction, ResignAction } from "./actions";
