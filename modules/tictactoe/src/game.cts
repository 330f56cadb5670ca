/**
 * Tic-tac-toe rules. Pure; the module class owns the session around them.
 *
 * Cells are numbered 0-8, left to right, top to bottom.
 */

export type Mark = 'X' | 'O';
export type Cell = Mark | null;
export type Board = ReadonlyArray<Cell>;

export type GameStatus =
  | { readonly kind: 'playing'; readonly next: Mark }
  | { readonly kind: 'won'; readonly winner: Mark; readonly line: readonly [number, number, number] }
  | { readonly kind: 'draw' };

export type MoveResult =
  | { readonly ok: true; readonly board: Board; readonly status: GameStatus }
  | { readonly ok: false; readonly reason: string };

const LINES: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2], [3, 4, 5], [6, 7, 8],
  [0, 3, 6], [1, 4, 7], [2, 5, 8],
  [0, 4, 8], [2, 4, 6],
];

export function emptyBoard(): Board {
  return Array.from({ length: 9 }, (): Cell => null);
}

export function statusOf(board: Board): GameStatus {
  for (const line of LINES) {
    const [a, b, c] = line;
    const mark = board[a];
    if (mark !== null && mark !== undefined && mark === board[b] && mark === board[c]) {
      return { kind: 'won', winner: mark, line };
    }
  }
  if (board.every((cell) => cell !== null)) return { kind: 'draw' };
  const xs = board.filter((cell) => cell === 'X').length;
  const os = board.filter((cell) => cell === 'O').length;
  return { kind: 'playing', next: xs > os ? 'O' : 'X' };
}

export function applyMove(board: Board, cell: number, mark: Mark): MoveResult {
  const status = statusOf(board);
  if (status.kind !== 'playing') return { ok: false, reason: 'game is over' };
  if (status.next !== mark) return { ok: false, reason: `it is ${status.next}'s turn` };
  if (!Number.isInteger(cell) || cell < 0 || cell > 8) return { ok: false, reason: 'cell must be an integer from 0 to 8' };
  if (board[cell] !== null) return { ok: false, reason: `cell ${cell} is taken` };

  const next = board.map((value, index) => (index === cell ? mark : value));
  return { ok: true, board: next, status: statusOf(next) };
}

/** Three rows of `X`, `O` and `.` separated by spaces. */
export function renderBoard(board: Board): string {
  const rows: string[] = [];
  for (let row = 0; row < 3; row++) {
    rows.push(board.slice(row * 3, row * 3 + 3).map((cell) => cell ?? '.').join(' '));
  }
  return rows.join('\n');
}
