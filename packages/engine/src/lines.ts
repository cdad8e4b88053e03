import type { Board } from './board.js';
import type { Line, LineKind, LineTally, Move } from './types.js';

const lineCache = new Map<number, readonly Line[]>();

function line(kind: LineKind, index: number, n: number, at: (i: number) => Move): Line {
  const cells = Array.from({ length: n }, (_, i) => Object.freeze(at(i)));
  return Object.freeze({ kind, index, cells: Object.freeze(cells) });
}

function buildLines(n: number): Line[] {
  const lines: Line[] = [];
  for (let r = 0; r < n; r++) {
    lines.push(line('row', r, n, (c) => ({ r, c })));
  }
  for (let c = 0; c < n; c++) {
    lines.push(line('column', c, n, (r) => ({ r, c })));
  }
  lines.push(line('diagonal', 0, n, (i) => ({ r: i, c: i })));
  lines.push(line('antiDiagonal', 0, n, (i) => ({ r: i, c: n - 1 - i })));
  return lines;
}

/**
 * Rows, then columns, then the main and anti diagonal: 2n + 2 lines.
 * Built once per size and shared by every board of that size, so every line
 * and cell is frozen.
 */
export function allLines(n: number): readonly Line[] {
  let lines = lineCache.get(n);
  if (!lines) {
    lines = Object.freeze(buildLines(n));
    lineCache.set(n, lines);
  }
  return lines;
}

export function linesThrough(n: number, move: Move): Line[] {
  const lines = allLines(n);
  const out: Line[] = [lines[move.r], lines[n + move.c]];
  if (move.r === move.c) out.push(lines[2 * n]);
  if (move.r + move.c === n - 1) out.push(lines[2 * n + 1]);
  return out;
}

export function tallyLine(board: Board, line: Line): LineTally {
  let x = 0;
  let o = 0;
  let empty = 0;
  for (const cell of line.cells) {
    const v = board.get(cell);
    if (v === 'X') x++;
    else if (v === 'O') o++;
    else empty++;
  }
  return { x, o, empty };
}
