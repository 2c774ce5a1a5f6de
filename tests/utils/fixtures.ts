/**
 * Test Fixtures and Utilities
 * Common pieces and board builders for board engine tests
 */

import { Board } from '../../src/shared/engine/Board';
import { createPiece, pieceFromRows } from '../../src/shared/engine/piece';
import type { Piece } from '../../src/shared/types/board';

/** Single cell. */
export const MONO: Piece = createPiece([{ dx: 0, dy: 0 }]);

/** 1x4 bar standing upright. */
export const VERTICAL_I: Piece = pieceFromRows(['#', '#', '#', '#']);

/** 4x1 bar lying flat. */
export const HORIZONTAL_I: Piece = pieceFromRows(['####']);

export const SQUARE: Piece = pieceFromRows(['##', '##']);

/** Cells in order: (0,0) (1,0) (0,1) (0,2). */
export const L_PIECE: Piece = pieceFromRows(['#.', '#.', '##']);

/** Overhang with skirt [1, 0]. */
export const HOOK: Piece = pieceFromRows(['##', '.#']);

export const ALL_PIECES: readonly Piece[] = [MONO, VERTICAL_I, HORIZONTAL_I, SQUARE, L_PIECE, HOOK];

/**
 * Creates a started, committed, empty board.
 */
export function createStartedBoard(width: number, height: number): Board {
  const board = new Board(width, height);
  board.newGame();
  return board;
}

/**
 * Builds a committed board from a picture, top row first. `#` marks a
 * filled cell; every row must have the same length.
 */
export function boardFromRows(rows: readonly string[]): Board {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const board = createStartedBoard(width, height);
  rows.forEach((line, index) => {
    const y = height - 1 - index;
    for (let x = 0; x < line.length; x++) {
      if (line.charAt(x) === '#') {
        board.place(MONO, x, y);
      }
    }
  });
  board.commit();
  return board;
}

/**
 * Builds a committed board from a cell matrix indexed `cells[y][x]`.
 */
export function boardFromCells(cells: readonly (readonly boolean[])[], width: number): Board {
  const board = createStartedBoard(width, cells.length);
  cells.forEach((row, y) => {
    row.forEach((filled, x) => {
      if (filled) {
        board.place(MONO, x, y);
      }
    });
  });
  board.commit();
  return board;
}

/**
 * Picture of the board, top row first, `#` filled and `.` empty.
 */
export function gridRows(board: Board): string[] {
  const rows: string[] = [];
  for (let y = board.height - 1; y >= 0; y--) {
    let line = '';
    for (let x = 0; x < board.width; x++) {
      line += board.occupied(x, y) ? '#' : '.';
    }
    rows.push(line);
  }
  return rows;
}

export function columnHeights(board: Board): number[] {
  return Array.from({ length: board.width }, (_, x) => board.columnHeight(x));
}

export function rowWidths(board: Board): number[] {
  return Array.from({ length: board.height }, (_, y) => board.rowWidth(y));
}
