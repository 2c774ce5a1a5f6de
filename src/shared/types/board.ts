/**
 * Shared board and piece types.
 *
 * Coordinates follow the playing field: x grows to the right from column 0,
 * y grows upward from row 0 at the bottom of the well.
 */

/** A single occupied cell of a piece, relative to the piece's anchor. */
export interface CellOffset {
  readonly dx: number;
  readonly dy: number;
}

/**
 * Read-only view of a piece as the board consumes it.
 *
 * `cells` is iterated in order during placement; the first cell that lands
 * outside the grid or on an occupied cell stops the placement. `skirt[i]` is
 * the lowest `dy` among the cells in relative column `i`.
 */
export interface Piece {
  readonly cells: readonly CellOffset[];
  readonly skirt: readonly number[];
  /** Number of relative columns spanned (== skirt.length). */
  readonly width: number;
  /** Number of relative rows spanned. */
  readonly height: number;
}

export interface BoardDimensions {
  width: number;
  height: number;
}

/**
 * Outcome of `Board.place`.
 *
 * - `ok`: every cell written, no row became full
 * - `row_filled`: every cell written and at least one row is now full
 * - `out_of_bounds`: a cell fell outside the grid; earlier cells stay written
 * - `collision`: a cell overlapped an occupied cell; earlier cells stay written
 */
export type PlacementResult = 'ok' | 'row_filled' | 'out_of_bounds' | 'collision';

export type PlacementFailure = Extract<PlacementResult, 'out_of_bounds' | 'collision'>;

export function isPlacementSuccess(
  result: PlacementResult
): result is Extract<PlacementResult, 'ok' | 'row_filled'> {
  return result === 'ok' || result === 'row_filled';
}

/** Plain copy of a board's cells and tallies, for tests and diagnostics. */
export interface BoardSnapshot {
  width: number;
  height: number;
  /** `cells[y][x]`, row 0 first. */
  cells: boolean[][];
  columnHeights: number[];
  rowWidths: number[];
}
