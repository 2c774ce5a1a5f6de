import type { CellOffset, Piece } from '../types/board';
import { PieceOffsetsSchema, formatIssues } from '../validation/schemas';
import { PieceShapeError } from './errors';

/**
 * Piece construction helpers.
 *
 * The board treats a piece as an external, read-only collaborator. These
 * helpers build values that satisfy the `Piece` contract from raw offsets so
 * callers (and tests) do not have to compute skirts by hand.
 */

const FILLED_GLYPHS = new Set(['#', 'X', 'x', '+']);

/**
 * Build a piece from its occupied offsets. Cell order is preserved: it is the
 * order in which `Board.place` writes cells.
 *
 * Every relative column between 0 and the rightmost offset must hold at least
 * one cell, otherwise the skirt for that column would be undefined.
 */
export function createPiece(offsets: readonly CellOffset[]): Piece {
  const parsed = PieceOffsetsSchema.safeParse(offsets);
  if (!parsed.success) {
    throw new PieceShapeError('Invalid piece offsets', { issues: formatIssues(parsed.error) });
  }

  const cells = parsed.data.map((cell) => Object.freeze({ dx: cell.dx, dy: cell.dy }));
  const width = Math.max(...cells.map((c) => c.dx)) + 1;
  const height = Math.max(...cells.map((c) => c.dy)) + 1;

  const skirt: number[] = [];
  for (let column = 0; column < width; column++) {
    const inColumn = cells.filter((c) => c.dx === column).map((c) => c.dy);
    if (inColumn.length === 0) {
      throw new PieceShapeError(`Piece has no cell in relative column ${column}`, {
        column,
        width,
      });
    }
    skirt.push(Math.min(...inColumn));
  }

  return Object.freeze({
    cells: Object.freeze(cells),
    skirt: Object.freeze(skirt),
    width,
    height,
  });
}

/**
 * Parse a small picture of a piece, top row first:
 *
 * ```
 * pieceFromRows(['#.', '#.', '##']) // L piece
 * ```
 *
 * `#`, `X` and `+` mark cells; anything else is empty. Cells are ordered
 * bottom row first, left to right within a row.
 */
export function pieceFromRows(rows: readonly string[]): Piece {
  const offsets: CellOffset[] = [];
  for (let line = rows.length - 1; line >= 0; line--) {
    const dy = rows.length - 1 - line;
    const text = rows[line] ?? '';
    for (let dx = 0; dx < text.length; dx++) {
      if (FILLED_GLYPHS.has(text.charAt(dx))) {
        offsets.push({ dx, dy });
      }
    }
  }
  return createPiece(offsets);
}

/**
 * Lowest occupied `dy` in relative column `column`, or undefined when the
 * column lies outside the piece.
 */
export function lowestOccupiedRow(piece: Piece, column: number): number | undefined {
  return piece.skirt[column];
}
