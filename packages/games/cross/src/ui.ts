import { Action } from "@pegcross/core";
import { GameUISpec } from "@pegcross/engine";
import { Direction, formatMove, moveInDirection } from "./move";
import { isCellGrid } from "./layout";
import { renderGrid } from "./render";
import { isMove } from "./state";
import { isJumpAction } from "./actions";

const DIRECTION_ALIASES: Record<string, Direction> = {
  right: "right",
  r: "right",
  up: "up",
  u: "up",
  left: "left",
  l: "left",
  down: "down",
  d: "down",
};

export const CrossUI: GameUISpec = {
  inputHint: 'Enter "R C DIR" to jump (e.g. "1 3 down"), or "resign"',

  renderBoard(publicData: Record<string, unknown>): string {
    const cells = publicData.cells;
    if (!isCellGrid(cells)) return "Waiting for game state...";

    const moves = Array.isArray(publicData.moves) ? publicData.moves : [];
    const last = moves.length > 0 ? moves[moves.length - 1] : null;
    const grid = renderGrid(cells, isMove(last) ? last : null);

    const header = "   " + cells.map((_, c) => String(c % 10)).join(" ");
    const lines = [header];
    grid.forEach((line, r) => lines.push(`${String(r % 10)}  ${line}`));
    return lines.join("\n");
  },

  renderStatus(publicData: Record<string, unknown>): string | null {
    if (publicData.resigned === true) return "You resigned.";
    const pegs = publicData.pegs;
    if (typeof pegs !== "number") return null;
    if (pegs === 1) return "Solved! One peg left.";
    return `${pegs} pegs remaining`;
  },

  parseInput(
    raw: string,
    _publicData: Record<string, unknown>
  ): Action | null {
    const trimmed = raw.trim().toLowerCase();

    if (trimmed === "resign") {
      return { type: "resign", data: {} };
    }

    // "R C DIR", 0-based like the rendered indices
    const match = trimmed.match(/^(\d+)\s+(\d+)\s+([a-z]+)$/);
    if (!match) return null;
    if (!Object.hasOwn(DIRECTION_ALIASES, match[3])) return null;
    const direction = DIRECTION_ALIASES[match[3]];

    return {
      type: "jump",
      data: {
        row: parseInt(match[1], 10),
        col: parseInt(match[2], 10),
        direction,
      },
    };
  },

  formatAction(action: Action): string {
    if (isJumpAction(action)) {
      const { row, col, direction } = action.data;
      return formatMove(moveInDirection({ row, col }, direction));
    }
    if (action.type === "resign") {
      return "resign";
    }
    return action.type;
  },
};
