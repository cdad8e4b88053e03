import type { Move } from '../types.js';

export function distanceToCenter(n: number, move: Move): number {
  const center = (n - 1) / 2;
  return Math.abs(move.r - center) + Math.abs(move.c - center);
}

/**
 * Center-first ordering by Manhattan distance, row-major among equals.
 * Central cells sit on more lines, so searching them first tightens the
 * alpha-beta window sooner.
 */
export function orderMoves(moves: Iterable<Move>, n: number): Move[] {
  const scored = Array.from(moves, (move) => ({
    move,
    dist: distanceToCenter(n, move),
    index: move.r * n + move.c,
  }));
  scored.sort((a, b) => a.dist - b.dist || a.index - b.index);
  return scored.map((entry) => entry.move);
}

/** The single center cell on odd boards, the four central cells on even ones. */
export function centerCells(n: number): Move[] {
  if (n % 2 === 1) {
    const m = (n - 1) / 2;
    return [{ r: m, c: m }];
  }
  const a = n / 2 - 1;
  const b = n / 2;
  return [
    { r: a, c: a },
    { r: a, c: b },
    { r: b, c: a },
    { r: b, c: b },
  ];
}
