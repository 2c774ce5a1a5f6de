import { v4 as uuidv4 } from 'uuid';
import {
  Board,
  EngineErrorCode,
  InvalidState,
  isPlacementSuccess,
  wrapEngineError,
  type Piece,
  type PlacementFailure,
} from '../../shared/engine';
import { config } from '../config';
import { logger, type LogMeta } from '../utils/logger';

export interface BoardSessionOptions {
  width?: number;
  height?: number;
  sessionId?: string;
  /** Rescan tallies after every drop and fail on any mismatch. */
  traceTallies?: boolean;
}

export type DropOutcome =
  | {
      kind: 'landed';
      x: number;
      y: number;
      rowsCleared: number;
      topOut: boolean;
    }
  | {
      kind: 'rejected';
      x: number;
      y: number;
      reason: PlacementFailure;
    };

export interface SessionStats {
  piecesPlaced: number;
  rowsCleared: number;
  rejectedDrops: number;
}

/**
 * Minimal driver around a {@link Board}: drops pieces straight down, clears
 * rows, commits successful drops and undoes failed ones.
 *
 * The session only counts what happened; it applies no scoring policy. It
 * owns game-over detection, which it derives from `Board.isTopOut()`.
 */
export class BoardSession {
  readonly board: Board;
  readonly sessionId: string;

  private readonly traceTallies: boolean;
  private stats: SessionStats = { piecesPlaced: 0, rowsCleared: 0, rejectedDrops: 0 };
  private over = false;

  constructor(options: BoardSessionOptions = {}) {
    this.board = new Board(
      options.width ?? config.board.width,
      options.height ?? config.board.height
    );
    this.sessionId = options.sessionId ?? uuidv4();
    this.traceTallies = options.traceTallies ?? config.board.traceTallies;
  }

  get isOver(): boolean {
    return this.over;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  start(): void {
    this.board.newGame();
    this.stats = { piecesPlaced: 0, rowsCleared: 0, rejectedDrops: 0 };
    this.over = false;
    logger.info(
      'Board session started',
      this.meta({ width: this.board.width, height: this.board.height })
    );
  }

  /**
   * Drop `piece` with its left edge at column `x`.
   *
   * A placement that fails (the piece pokes above the ceiling, or overlaps)
   * is undone before returning, so the board is always valid between drops.
   * A column outside the board is logged and rethrown as an engine error.
   */
  drop(piece: Piece, x: number): DropOutcome {
    if (this.over) {
      throw new InvalidState(
        EngineErrorCode.STATE_SESSION_OVER,
        'Cannot drop a piece after the board has topped out',
        { sessionId: this.sessionId },
        'BoardSession'
      );
    }

    let y: number;
    try {
      y = this.board.dropHeight(piece, x);
    } catch (error) {
      const engineError = wrapEngineError(error, 'BoardSession', { sessionId: this.sessionId });
      logger.error('Drop failed', this.meta({ x, error: engineError.toJSON() }));
      throw engineError;
    }
    const result = this.board.place(piece, x, y);

    if (!isPlacementSuccess(result)) {
      this.board.undo();
      this.stats.rejectedDrops++;
      logger.warn('Placement rejected, board restored', this.meta({ x, y, reason: result }));
      return { kind: 'rejected', x, y, reason: result };
    }

    const rowsCleared = result === 'row_filled' ? this.board.clearRows() : 0;
    this.board.commit();
    this.stats.piecesPlaced++;
    this.stats.rowsCleared += rowsCleared;

    if (rowsCleared > 0) {
      logger.debug('Rows cleared', this.meta({ rowsCleared, maxHeight: this.board.maxHeight() }));
    }
    if (this.traceTallies) {
      this.assertTallies();
    }

    const topOut = this.board.isTopOut();
    if (topOut) {
      this.over = true;
      logger.info('Board topped out', this.meta({ ...this.stats }));
    }

    return { kind: 'landed', x, y, rowsCleared, topOut };
  }

  private assertTallies(): void {
    const mismatches = this.board.auditTallies();
    if (mismatches.length === 0) {
      return;
    }
    logger.error(
      'Board tallies disagree with grid',
      this.meta({ mismatches, board: this.board.toString() })
    );
    throw new InvalidState(
      EngineErrorCode.STATE_TALLY_MISMATCH,
      `Found ${mismatches.length} tally mismatch(es)`,
      { sessionId: this.sessionId, mismatches },
      'BoardSession'
    );
  }

  private meta(extra: LogMeta = {}): LogMeta {
    return { sessionId: this.sessionId, ...extra };
  }
}
