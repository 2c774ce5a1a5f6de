/**
 * Plain-text dump of a board for debugging, logs and test failure output.
 *
 * Rows are printed top to bottom, each wrapped in `|`, with `+` for a filled
 * cell and a space for an empty one, followed by a `-` floor two characters
 * wider than the board:
 *
 * ```
 * |    |
 * |+   |
 * |++ +|
 * ------
 * ```
 */

export interface RenderableBoard {
  readonly width: number;
  readonly height: number;
  occupied(x: number, y: number): boolean;
}

export interface BoardRenderOptions {
  filled?: string;
  empty?: string;
}

export function renderBoard(board: RenderableBoard, options: BoardRenderOptions = {}): string {
  const filled = options.filled ?? '+';
  const empty = options.empty ?? ' ';

  const lines: string[] = [];
  for (let y = board.height - 1; y >= 0; y--) {
    let line = '|';
    for (let x = 0; x < board.width; x++) {
      line += board.occupied(x, y) ? filled : empty;
    }
    lines.push(line + '|');
  }
  lines.push('-'.repeat(board.width + 2));
  return lines.join('\n');
}
