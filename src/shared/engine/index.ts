// =============================================================================
// BOARD ENGINE - PUBLIC API
// =============================================================================
// Drivers (BoardSession, tests, future front ends) should only import from
// this file.
//
// - NARROW: only what a caller needs to place, clear, commit and undo
// - SYNCHRONOUS: every operation runs to completion before returning
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/board.ts)
// =============================================================================

export type {
  CellOffset,
  Piece,
  BoardDimensions,
  PlacementResult,
  PlacementFailure,
  BoardSnapshot,
} from '../types/board';
export { isPlacementSuccess } from '../types/board';

// =============================================================================
// BOARD
// =============================================================================

export { Board } from './Board';
export type { TallyMismatch } from './boardGrid';
export { renderBoard } from './boardRendering';
export type { RenderableBoard, BoardRenderOptions } from './boardRendering';

// =============================================================================
// PIECES
// =============================================================================

export { createPiece, pieceFromRows, lowestOccupiedRow } from './piece';

// =============================================================================
// COMMIT STATE
// =============================================================================

export type {
  BoardCommitState,
  BoardMutationKind,
  CommittedState,
  UncommittedState,
} from '../stateMachines/boardCommit';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  InvalidState,
  BoardConstraintViolation,
  PieceShapeError,
  isEngineError,
  isInvalidState,
  isBoardConstraintViolation,
  isPieceShapeError,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
