import {
  createPiece,
  lowestOccupiedRow,
  pieceFromRows,
} from '../../../src/shared/engine/piece';
import {
  EngineErrorCode,
  PieceShapeError,
  isPieceShapeError,
} from '../../../src/shared/engine/errors';

describe('piece helpers', () => {
  describe('createPiece', () => {
    it('keeps cell order and derives size and skirt', () => {
      const piece = createPiece([
        { dx: 1, dy: 0 },
        { dx: 0, dy: 1 },
        { dx: 1, dy: 1 },
        { dx: 2, dy: 1 },
      ]);

      expect(piece.cells).toEqual([
        { dx: 1, dy: 0 },
        { dx: 0, dy: 1 },
        { dx: 1, dy: 1 },
        { dx: 2, dy: 1 },
      ]);
      expect(piece.width).toBe(3);
      expect(piece.height).toBe(2);
      expect(piece.skirt).toEqual([1, 0, 1]);
    });

    it('returns a frozen value', () => {
      const piece = createPiece([{ dx: 0, dy: 0 }]);

      expect(Object.isFrozen(piece)).toBe(true);
      expect(Object.isFrozen(piece.cells)).toBe(true);
      expect(Object.isFrozen(piece.skirt)).toBe(true);
    });

    it('rejects an empty offset list', () => {
      expect(() => createPiece([])).toThrow(PieceShapeError);
    });

    it('rejects negative and fractional offsets', () => {
      expect(() => createPiece([{ dx: -1, dy: 0 }])).toThrow(PieceShapeError);
      expect(() => createPiece([{ dx: 0, dy: 0.5 }])).toThrow(PieceShapeError);
    });

    it('rejects duplicate cells and reports the offending path', () => {
      try {
        createPiece([
          { dx: 0, dy: 0 },
          { dx: 0, dy: 0 },
        ]);
        throw new Error('expected createPiece to throw');
      } catch (error) {
        expect(isPieceShapeError(error)).toBe(true);
        const shapeError = error as PieceShapeError;
        expect(shapeError.code).toBe(EngineErrorCode.PIECE_INVALID_SHAPE);
        expect(shapeError.context).toEqual({
          issues: [{ path: '1', message: 'Duplicate cell 0,0' }],
        });
      }
    });

    it('rejects a gap column', () => {
      expect(() =>
        createPiece([
          { dx: 0, dy: 0 },
          { dx: 2, dy: 0 },
        ])
      ).toThrow('Piece has no cell in relative column 1');
    });
  });

  describe('pieceFromRows', () => {
    it('parses a picture bottom row first', () => {
      const piece = pieceFromRows(['#.', '#.', '##']);

      expect(piece.cells).toEqual([
        { dx: 0, dy: 0 },
        { dx: 1, dy: 0 },
        { dx: 0, dy: 1 },
        { dx: 0, dy: 2 },
      ]);
      expect(piece.skirt).toEqual([0, 0]);
      expect(piece.height).toBe(3);
    });

    it('accepts X and + as filled glyphs', () => {
      const piece = pieceFromRows(['X+']);

      expect(piece.cells).toEqual([
        { dx: 0, dy: 0 },
        { dx: 1, dy: 0 },
      ]);
    });

    it('derives the skirt of an overhang', () => {
      expect(pieceFromRows(['##', '.#']).skirt).toEqual([1, 0]);
    });
  });

  it('lowestOccupiedRow reads the skirt and is undefined outside the piece', () => {
    const piece = pieceFromRows(['##.', '.##']);

    expect(lowestOccupiedRow(piece, 0)).toBe(1);
    expect(lowestOccupiedRow(piece, 1)).toBe(0);
    expect(lowestOccupiedRow(piece, 2)).toBe(0);
    expect(lowestOccupiedRow(piece, 3)).toBeUndefined();
  });
});
