import type { Board, Move } from '@gridline/engine';

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

/** The grid with a square-index guide to its right. */
export function renderBoard(board: Board): string {
  const n = board.size;
  const width = String(n * n - 1).length;
  return board
    .rows()
    .map((row, r) => {
      const cells = row.map((cell) => pad(cell ?? ' ', width)).join(' | ');
      const guide = row.map((_, c) => pad(String(r * n + c), width)).join(' | ');
      return `| ${cells} |    | ${guide} |`;
    })
    .join('\n');
}

export function renderIndexGuide(size: number): string {
  const width = String(size * size - 1).length;
  const lines: string[] = [];
  for (let r = 0; r < size; r++) {
    const guide = Array.from({ length: size }, (_, c) => pad(String(r * size + c), width)).join(' | ');
    lines.push(`| ${guide} |`);
  }
  return lines.join('\n');
}

export function squareIndex(move: Move, size: number): number {
  return move.r * size + move.c;
}

export function formatMove(move: Move, size: number): string {
  return `square ${squareIndex(move, size)} (${move.r}, ${move.c})`;
}

/**
 * Accepts a square index (`0` .. `n*n - 1`) or a `row,col` pair. Returns null
 * for anything out of range or unparseable.
 */
export function parseSquare(input: string, size: number): Move | null {
  const text = input.trim();
  const index = /^\d+$/.exec(text);
  if (index) {
    const value = Number(text);
    if (value >= size * size) {
      return null;
    }
    return { r: Math.floor(value / size), c: value % size };
  }
  const pair = /^(\d+)\s*[, ]\s*(\d+)$/.exec(text);
  if (pair) {
    const r = Number(pair[1]);
    const c = Number(pair[2]);
    if (r >= size || c >= size) {
      return null;
    }
    return { r, c };
  }
  return null;
}
