import { InvalidMoveError, InvalidSizeError } from './errors.js';
import { allLines, linesThrough } from './lines.js';
import type { Cell, Move, Player } from './types.js';

export function createGrid(n: number): Cell[][] {
  return Array.from({ length: n }, () => Array<Cell>(n).fill(null));
}

export function cloneGrid(b: Cell[][]): Cell[][] {
  return b.map((row) => row.slice());
}

export function inBounds(n: number, r: number, c: number): boolean {
  return Number.isInteger(r) && Number.isInteger(c) && r >= 0 && c >= 0 && r < n && c < n;
}

export function nextPlayer(p: Player): Player {
  return p === 'X' ? 'O' : 'X';
}

/**
 * Mutable n×n grid. Search places and undoes marks on a single instance, so
 * every placement must be undone in reverse order before the caller sees the
 * board again.
 */
export class Board {
  readonly size: number;
  private readonly grid: Cell[][];
  private readonly history: Move[] = [];
  private xCount = 0;
  private oCount = 0;

  constructor(size: number, grid?: Cell[][]) {
    if (!Number.isInteger(size) || size < 3) {
      throw new InvalidSizeError(size);
    }
    this.size = size;
    this.grid = grid ? cloneGrid(grid) : createGrid(size);
    for (const row of this.grid) {
      for (const cell of row) {
        if (cell === 'X') this.xCount++;
        else if (cell === 'O') this.oCount++;
      }
    }
  }

  /**
   * Builds a position from one string per row: 'X', 'O', and '.' (or space)
   * for empty. The result has no move history, so `lastMove` is null.
   */
  static fromRows(rows: readonly string[]): Board {
    const n = rows.length;
    const grid = createGrid(n);
    rows.forEach((row, r) => {
      if (row.length !== n) {
        throw new InvalidSizeError(row.length);
      }
      for (let c = 0; c < n; c++) {
        const ch = row[c].toUpperCase();
        if (ch === 'X' || ch === 'O') {
          grid[r][c] = ch;
        } else if (ch !== '.' && ch !== ' ') {
          throw new InvalidMoveError({ r, c }, `unknown cell symbol '${row[c]}'`);
        }
      }
    });
    return new Board(n, grid);
  }

  get lastMove(): Move | null {
    const last = this.history[this.history.length - 1];
    return last ? { r: last.r, c: last.c } : null;
  }

  get counts(): { X: number; O: number; empty: number } {
    return { X: this.xCount, O: this.oCount, empty: this.size * this.size - this.xCount - this.oCount };
  }

  get(move: Move): Cell {
    return this.grid[move.r][move.c];
  }

  place(move: Move, mark: Player): void {
    if (!inBounds(this.size, move.r, move.c)) {
      throw new InvalidMoveError(move, 'out of range');
    }
    if (this.grid[move.r][move.c] !== null) {
      throw new InvalidMoveError(move, 'cell is occupied');
    }
    this.grid[move.r][move.c] = mark;
    if (mark === 'X') this.xCount++;
    else this.oCount++;
    this.history.push({ r: move.r, c: move.c });
  }

  undo(move: Move): void {
    if (!inBounds(this.size, move.r, move.c)) {
      throw new InvalidMoveError(move, 'out of range');
    }
    const mark = this.grid[move.r][move.c];
    if (mark === null) {
      throw new InvalidMoveError(move, 'cell is already empty');
    }
    this.grid[move.r][move.c] = null;
    if (mark === 'X') this.xCount--;
    else this.oCount--;
    const last = this.lastMove;
    if (last && last.r === move.r && last.c === move.c) {
      this.history.pop();
    }
  }

  *legalMoves(): Generator<Move, void, undefined> {
    const n = this.size;
    for (let r = 0; r < n; r++) {
      for (let c = 0; c < n; c++) {
        if (this.grid[r][c] === null) yield { r, c };
      }
    }
  }

  /**
   * Only lines through `move` are inspected: a win can only be completed by
   * the mark just placed.
   */
  checkWin(move: Move | null = this.lastMove): Player | null {
    if (!move || !inBounds(this.size, move.r, move.c)) {
      return null;
    }
    const mark = this.grid[move.r][move.c];
    if (mark === null) {
      return null;
    }
    for (const line of linesThrough(this.size, move)) {
      if (line.cells.every((cell) => this.grid[cell.r][cell.c] === mark)) {
        return mark;
      }
    }
    return null;
  }

  /** Full O(n²) scan, for positions without a trustworthy last move. */
  winner(): Player | null {
    for (const line of allLines(this.size)) {
      const first = this.get(line.cells[0]);
      if (first !== null && line.cells.every((cell) => this.get(cell) === first)) {
        return first;
      }
    }
    return null;
  }

  isFull(): boolean {
    return this.xCount + this.oCount === this.size * this.size;
  }

  isDraw(): boolean {
    return this.isFull() && this.winner() === null;
  }

  clone(): Board {
    const copy = new Board(this.size, this.grid);
    copy.history.push(...this.history.map((m) => ({ r: m.r, c: m.c })));
    return copy;
  }

  rows(): Cell[][] {
    return cloneGrid(this.grid);
  }

  toString(): string {
    return this.grid.map((row) => row.map((cell) => cell ?? '.').join('')).join('\n');
  }
}

export function newBoard(size: number): Board {
  return new Board(size);
}
