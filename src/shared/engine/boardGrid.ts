import type { BoardSnapshot } from '../types/board';

/**
 * Flat storage for a board's cells and cached tallies.
 *
 * Cells are row-major: row `y` occupies `cells[y * width .. y * width + width)`,
 * so moving a whole row during compaction is a single `copyWithin`.
 *
 * `columnHeights[x]` is one more than the highest occupied y in column x
 * (0 when empty). `rowWidths[y]` is the number of occupied cells in row y.
 * Both are caches over `cells`; after any bulk move of rows they must be
 * rebuilt with `rederiveTallies`.
 */
export interface BoardGrid {
  readonly width: number;
  readonly height: number;
  readonly cells: Uint8Array;
  readonly columnHeights: Int32Array;
  readonly rowWidths: Int32Array;
}

export interface TallyMismatch {
  axis: 'column' | 'row';
  index: number;
  cached: number;
  actual: number;
}

export function createBoardGrid(width: number, height: number): BoardGrid {
  return {
    width,
    height,
    cells: new Uint8Array(width * height),
    columnHeights: new Int32Array(width),
    rowWidths: new Int32Array(height),
  };
}

export function cellIndex(grid: BoardGrid, x: number, y: number): number {
  return y * grid.width + x;
}

/** Integer coordinates within the grid; fractional ones name no cell. */
export function isInsideGrid(grid: BoardGrid, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    x < grid.width &&
    y >= 0 &&
    y < grid.height
  );
}

export function isCellFilled(grid: BoardGrid, x: number, y: number): boolean {
  return grid.cells[cellIndex(grid, x, y)] === 1;
}

export function clearBoardGrid(grid: BoardGrid): void {
  grid.cells.fill(0);
  grid.columnHeights.fill(0);
  grid.rowWidths.fill(0);
}

/**
 * Deep copy of cells and tallies from `source` into `target`. Both grids
 * must share dimensions; no buffer is ever shared between them.
 */
export function copyBoardGrid(source: BoardGrid, target: BoardGrid): void {
  target.cells.set(source.cells);
  target.columnHeights.set(source.columnHeights);
  target.rowWidths.set(source.rowWidths);
}

export function gridMaxHeight(grid: BoardGrid): number {
  let max = 0;
  for (let x = 0; x < grid.width; x++) {
    const h = grid.columnHeights[x] ?? 0;
    if (h > max) max = h;
  }
  return max;
}

/**
 * Rebuild `columnHeights` and `rowWidths` from the cells with a full rescan.
 */
export function rederiveTallies(grid: BoardGrid): void {
  grid.columnHeights.fill(0);
  grid.rowWidths.fill(0);
  for (let y = 0; y < grid.height; y++) {
    const rowStart = y * grid.width;
    for (let x = 0; x < grid.width; x++) {
      if (grid.cells[rowStart + x] === 1) {
        grid.columnHeights[x] = y + 1;
        grid.rowWidths[y] = (grid.rowWidths[y] ?? 0) + 1;
      }
    }
  }
}

/**
 * Remove every full row and drop the rows above it, keeping their order.
 *
 * Fullness is read from `rowWidths`, which must be current on entry. Only
 * rows below the current max height are scanned; everything above is empty
 * already. Rows vacated at the top are zeroed.
 *
 * Cells are moved but tallies are NOT updated here: callers rebuild them with
 * `rederiveTallies` when the returned count is non-zero. With no full rows
 * the grid is left untouched.
 *
 * @returns number of rows that were full before compaction
 */
export function compactFullRows(grid: BoardGrid): number {
  const top = gridMaxHeight(grid);
  const { width } = grid;
  let writeRow = 0;
  let cleared = 0;

  for (let readRow = 0; readRow < top; readRow++) {
    if (grid.rowWidths[readRow] === width) {
      cleared++;
      continue;
    }
    if (writeRow !== readRow) {
      grid.cells.copyWithin(writeRow * width, readRow * width, (readRow + 1) * width);
    }
    writeRow++;
  }

  if (cleared > 0) {
    grid.cells.fill(0, writeRow * width, top * width);
  }
  return cleared;
}

/**
 * Compare the cached tallies against a fresh rescan of the cells. An empty
 * result means the caches are consistent.
 */
export function findTallyMismatches(grid: BoardGrid): TallyMismatch[] {
  const fresh = createBoardGrid(grid.width, grid.height);
  fresh.cells.set(grid.cells);
  rederiveTallies(fresh);

  const mismatches: TallyMismatch[] = [];
  for (let x = 0; x < grid.width; x++) {
    const cached = grid.columnHeights[x] ?? 0;
    const actual = fresh.columnHeights[x] ?? 0;
    if (cached !== actual) {
      mismatches.push({ axis: 'column', index: x, cached, actual });
    }
  }
  for (let y = 0; y < grid.height; y++) {
    const cached = grid.rowWidths[y] ?? 0;
    const actual = fresh.rowWidths[y] ?? 0;
    if (cached !== actual) {
      mismatches.push({ axis: 'row', index: y, cached, actual });
    }
  }
  return mismatches;
}

export function toBoardSnapshot(grid: BoardGrid): BoardSnapshot {
  const cells: boolean[][] = [];
  for (let y = 0; y < grid.height; y++) {
    const row: boolean[] = [];
    for (let x = 0; x < grid.width; x++) {
      row.push(isCellFilled(grid, x, y));
    }
    cells.push(row);
  }
  return {
    width: grid.width,
    height: grid.height,
    cells,
    columnHeights: Array.from(grid.columnHeights),
    rowWidths: Array.from(grid.rowWidths),
  };
}
