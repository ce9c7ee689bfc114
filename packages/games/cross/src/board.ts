import { Location, formatLocation } from "./geometry";
import { DIRECTIONS, Move, moveInDirection, skippedLocation, formatMove } from "./move";
import {
  Transformation,
  allTransformations,
  isOrbitRepresentative,
} from "./transformation";
import { CellGrid, CellState, cloneCells, countCells } from "./layout";
import { MoveCounter } from "./counter";
import { SearchNode, SearchOptions, findBestMoveList } from "./search";

/**
 * Everything that stays fixed while searching from one layout: the off
 * mask, the geometrically allowable jumps, the grid symmetries and the
 * depth cap.
 */
export class BoardRules {
  readonly size: number;
  readonly maxDepth: number;
  readonly positions: readonly Location[];
  readonly allowableMoves: readonly Move[];
  readonly transformations: readonly Transformation[];
  private readonly initialCells: CellGrid;

  constructor(layout: CellGrid, maxDepth: number) {
    if (layout.length === 0 || layout.some((row) => row.length !== layout.length)) {
      throw new Error("Board layout must be a non-empty square grid");
    }
    if (maxDepth < 0 || !(Number.isInteger(maxDepth) || maxDepth === Infinity)) {
      throw new Error(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }

    this.size = layout.length;
    this.maxDepth = maxDepth;
    this.initialCells = cloneCells(layout);
    this.transformations = allTransformations(this.size);

    const positions: Location[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        positions.push({ row, col });
      }
    }
    this.positions = positions;

    this.allowableMoves = positions
      .flatMap((pos) => DIRECTIONS.map((dir) => moveInDirection(pos, dir)))
      .filter((m) => this.isLegalLocation(m.from) && this.isLegalLocation(m.to));
  }

  isInBounds(v: Location): boolean {
    return v.row >= 0 && v.col >= 0 && v.row < this.size && v.col < this.size;
  }

  /** In bounds and part of the playable shape. */
  isLegalLocation(v: Location): boolean {
    return this.isInBounds(v) && this.initialCells[v.row][v.col] !== "off";
  }

  createInitialBoard(): Board {
    return new Board(this, cloneCells(this.initialCells), []);
  }

  /** Rebuild a board from stored cells, e.g. a saved game state. */
  createBoard(cells: CellGrid, movesSoFar: readonly Move[]): Board {
    if (cells.length !== this.size) {
      throw new Error(`Expected a ${this.size}x${this.size} grid, got ${cells.length} rows`);
    }
    cells.forEach((row, r) => {
      if (row.length !== this.size) {
        throw new Error(`Row ${r} has ${row.length} cells, expected ${this.size}`);
      }
      row.forEach((cell, c) => {
        if ((cell === "off") !== (this.initialCells[r][c] === "off")) {
          throw new Error(`Cell ${formatLocation({ row: r, col: c })} does not match the layout's off cells`);
        }
      });
    });
    return new Board(this, cloneCells(cells), [...movesSoFar]);
  }
}

/**
 * Immutable board snapshot: cell occupancy plus the moves that led here
 * from the initial layout. Applying a move returns a new Board.
 */
export class Board implements SearchNode<Board> {
  private _symmetries: readonly Transformation[] | null = null;

  constructor(
    readonly rules: BoardRules,
    private readonly cells: CellGrid,
    readonly movesSoFar: readonly Move[]
  ) {}

  get maxDepth(): number {
    return this.rules.maxDepth;
  }

  get size(): number {
    return this.rules.size;
  }

  get lastMove(): Move | null {
    return this.movesSoFar.length > 0
      ? this.movesSoFar[this.movesSoFar.length - 1]
      : null;
  }

  getCellValue(v: Location): CellState {
    if (!this.rules.isInBounds(v)) {
      throw new Error(`Location ${formatLocation(v)} is outside the ${this.size}x${this.size} board`);
    }
    return this.cells[v.row][v.col];
  }

  /** Copy of the cell grid. */
  getCells(): CellGrid {
    return cloneCells(this.cells);
  }

  countPegs(): number {
    return countCells(this.cells, "occupied");
  }

  isInvariantUnderTransformation(t: Transformation): boolean {
    return this.rules.positions.every(
      (v) => this.getCellValue(v) === this.getCellValue(t.apply(v))
    );
  }

  /** Transformations this board is invariant under; computed on first use. */
  get symmetries(): readonly Transformation[] {
    if (this._symmetries === null) {
      this._symmetries = this.rules.transformations.filter((t) =>
        this.isInvariantUnderTransformation(t)
      );
    }
    return this._symmetries;
  }

  isCellOrbitRepresentativeOfAllSymmetries(v: Location): boolean {
    return this.symmetries.every((t) => isOrbitRepresentative(t, v));
  }

  isMovePossible(move: Move): boolean {
    return (
      this.getCellValue(move.from) === "occupied" &&
      this.getCellValue(move.to) === "empty" &&
      this.getCellValue(skippedLocation(move)) === "occupied"
    );
  }

  /** Moves the search explores: capped by depth, one per symmetric class. */
  getPossibleMoves(): Move[] {
    if (this.movesSoFar.length >= this.maxDepth) return [];
    return this.rules.allowableMoves.filter(
      (m) => this.isMovePossible(m) && this.isCellOrbitRepresentativeOfAllSymmetries(m.from)
    );
  }

  /** Every jump a player may make here, without depth cap or pruning. */
  getLegalMoves(): Move[] {
    return this.rules.allowableMoves.filter((m) => this.isMovePossible(m));
  }

  applyMove(move: Move, counter?: MoveCounter): Board {
    counter?.increment();
    const next = cloneCells(this.cells);
    const skipped = skippedLocation(move);
    next[skipped.row][skipped.col] = "empty";
    next[move.from.row][move.from.col] = "empty";
    next[move.to.row][move.to.col] = "occupied";
    return new Board(this.rules, next, [...this.movesSoFar, move]);
  }

  getBestMoveList(options: SearchOptions = {}): readonly Move[] {
    return findBestMoveList<Board>(this, options);
  }

  toString(): string {
    return `Board(${this.countPegs()} pegs; ${this.movesSoFar.map(formatMove).join(" ")})`;
  }
}
