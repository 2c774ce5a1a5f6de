import type { BoardSnapshot, Piece, PlacementResult } from '../types/board';
import { BoardDimensionsSchema, formatIssues } from '../validation/schemas';
import {
  beginMutation,
  decideUndo,
  isCommitted,
  makeCommittedState,
  makeInitialCommitState,
  type BoardCommitState,
  type BoardMutationKind,
} from '../stateMachines/boardCommit';
import {
  cellIndex,
  clearBoardGrid,
  compactFullRows,
  copyBoardGrid,
  createBoardGrid,
  findTallyMismatches,
  gridMaxHeight,
  isCellFilled,
  isInsideGrid,
  rederiveTallies,
  toBoardSnapshot,
  type BoardGrid,
  type TallyMismatch,
} from './boardGrid';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidState,
  indexOutOfRange,
} from './errors';
import { renderBoard } from './boardRendering';
import { lowestOccupiedRow } from './piece';

/**
 * Playing field of a block-stacking game.
 *
 * The board owns a live grid, a backup grid of the same size, and the
 * commit state. Both grids are allocated once here and reused for the
 * board's lifetime.
 *
 * Typical driver loop:
 *
 * ```typescript
 * const board = new Board(10, 24);
 * board.newGame();
 * const y = board.dropHeight(piece, x);
 * const result = board.place(piece, x, y);
 * if (result === 'out_of_bounds' || result === 'collision') {
 *   board.undo();
 * } else {
 *   board.clearRows();
 *   board.commit();
 * }
 * ```
 *
 * A board must be started with `newGame()` before use; until then it has no
 * snapshot and `undo()` throws.
 */
export class Board {
  readonly width: number;
  readonly height: number;

  private readonly live: BoardGrid;
  private readonly backup: BoardGrid;
  private state: BoardCommitState;

  constructor(width: number, height: number) {
    const parsed = BoardDimensionsSchema.safeParse({ width, height });
    if (!parsed.success) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_DIMENSIONS,
        `Board dimensions must be positive integers, got ${width}x${height}`,
        { width, height, issues: formatIssues(parsed.error) }
      );
    }

    this.width = parsed.data.width;
    this.height = parsed.data.height;
    this.live = createBoardGrid(this.width, this.height);
    this.backup = createBoardGrid(this.width, this.height);
    this.state = makeInitialCommitState();
  }

  /**
   * Empty every cell and tally and mark the board committed.
   */
  newGame(): void {
    clearBoardGrid(this.live);
    this.state = makeCommittedState();
  }

  get committed(): boolean {
    return isCommitted(this.state);
  }

  get commitState(): Readonly<BoardCommitState> {
    return this.state;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Tallest column height; 0 for an empty board. */
  maxHeight(): number {
    return gridMaxHeight(this.live);
  }

  columnHeight(x: number): number {
    if (!Number.isInteger(x) || x < 0 || x >= this.width) {
      throw indexOutOfRange('column', x, this.width);
    }
    return this.live.columnHeights[x] ?? 0;
  }

  rowWidth(y: number): number {
    if (!Number.isInteger(y) || y < 0 || y >= this.height) {
      throw indexOutOfRange('row', y, this.height);
    }
    return this.live.rowWidths[y] ?? 0;
  }

  /**
   * True when the cell is filled. Cells outside the grid always report
   * occupied, so neighbours can be probed without a separate bounds check.
   */
  occupied(x: number, y: number): boolean {
    if (!isInsideGrid(this.live, x, y)) {
      return true;
    }
    return isCellFilled(this.live, x, y);
  }

  /** A column has reached the ceiling. Raising game over is the caller's job. */
  isTopOut(): boolean {
    return this.maxHeight() >= this.height;
  }

  /**
   * y at which `piece` comes to rest if dropped straight down with its left
   * edge at `anchorX`. Read from the column tallies only.
   */
  dropHeight(piece: Piece, anchorX: number): number {
    let landing = 0;
    for (let i = 0; i < piece.width; i++) {
      const lowest = lowestOccupiedRow(piece, i) ?? 0;
      const candidate = this.columnHeight(anchorX + i) - lowest;
      if (candidate > landing) {
        landing = candidate;
      }
    }
    return landing;
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Write the piece's cells with its anchor at (anchorX, anchorY).
   *
   * Cells are written in the piece's order. The first cell that falls outside
   * the grid (a fractional coordinate counts as outside) or onto an occupied
   * cell stops the placement; cells written
   * before it stay written. The board is then invalid for play and the caller
   * recovers with `undo()`.
   */
  place(piece: Piece, anchorX: number, anchorY: number): PlacementResult {
    this.openEpisode('place');

    const grid = this.live;
    let rowFilled = false;

    for (const cell of piece.cells) {
      const x = anchorX + cell.dx;
      const y = anchorY + cell.dy;

      if (!isInsideGrid(grid, x, y)) {
        return 'out_of_bounds';
      }
      const index = cellIndex(grid, x, y);
      if (grid.cells[index] === 1) {
        return 'collision';
      }

      grid.cells[index] = 1;
      if ((grid.columnHeights[x] ?? 0) < y + 1) {
        grid.columnHeights[x] = y + 1;
      }
      const filled = (grid.rowWidths[y] ?? 0) + 1;
      grid.rowWidths[y] = filled;
      if (filled === this.width) {
        rowFilled = true;
      }
    }

    return rowFilled ? 'row_filled' : 'ok';
  }

  /**
   * Remove all full rows, dropping the rows above them.
   *
   * @returns number of rows that were full before compaction
   */
  clearRows(): number {
    this.openEpisode('clear_rows');

    const cleared = compactFullRows(this.live);
    if (cleared > 0) {
      rederiveTallies(this.live);
    }
    return cleared;
  }

  /** Accept the pending episode. Idempotent. */
  commit(): void {
    this.state = makeCommittedState();
  }

  /**
   * Revert to the state at the start of the pending episode. No-op when
   * committed, so a second consecutive undo does nothing.
   */
  undo(): void {
    const decision = decideUndo(this.state);
    if (decision === 'noop') {
      return;
    }
    if (decision === 'no_backup') {
      throw new InvalidState(
        EngineErrorCode.STATE_NO_BACKUP_AVAILABLE,
        'Cannot undo: no snapshot has been taken (call newGame() first)',
        { width: this.width, height: this.height },
        'Board'
      );
    }

    copyBoardGrid(this.backup, this.live);
    this.state = makeCommittedState();
  }

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  /** Cached tallies that disagree with a rescan of the cells. */
  auditTallies(): TallyMismatch[] {
    return findTallyMismatches(this.live);
  }

  snapshot(): BoardSnapshot {
    return toBoardSnapshot(this.live);
  }

  toString(): string {
    return renderBoard(this);
  }

  private openEpisode(mutation: BoardMutationKind): void {
    const transition = beginMutation(this.state, mutation);
    if (transition.takeSnapshot) {
      copyBoardGrid(this.live, this.backup);
    }
    this.state = transition.state;
  }
}
