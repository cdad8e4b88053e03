import { describe, expect, it } from 'vitest';
import { Board } from './board.js';
import { allLines, linesThrough, tallyLine } from './lines.js';

describe('allLines', () => {
  it('lists rows, columns and both diagonals', () => {
    const lines = allLines(4);
    expect(lines).toHaveLength(10);
    expect(lines.map((line) => line.kind)).toEqual([
      'row',
      'row',
      'row',
      'row',
      'column',
      'column',
      'column',
      'column',
      'diagonal',
      'antiDiagonal',
    ]);
    expect(lines[5].cells).toEqual([
      { r: 0, c: 1 },
      { r: 1, c: 1 },
      { r: 2, c: 1 },
      { r: 3, c: 1 },
    ]);
    expect(lines[9].cells).toEqual([
      { r: 0, c: 3 },
      { r: 1, c: 2 },
      { r: 2, c: 1 },
      { r: 3, c: 0 },
    ]);
  });

  it('returns the same cached lines for the same size', () => {
    expect(allLines(5)).toBe(allLines(5));
  });

  it('freezes the shared lines down to their cells', () => {
    const [row] = allLines(3);
    expect(Object.isFrozen(allLines(3))).toBe(true);
    expect(Object.isFrozen(row)).toBe(true);
    expect(Object.isFrozen(row.cells)).toBe(true);
    expect(Object.isFrozen(row.cells[0])).toBe(true);
  });
});

describe('linesThrough', () => {
  it('includes both diagonals for the center of an odd board', () => {
    expect(linesThrough(3, { r: 1, c: 1 }).map((line) => line.kind)).toEqual([
      'row',
      'column',
      'diagonal',
      'antiDiagonal',
    ]);
  });

  it('includes only the row and column for an edge cell', () => {
    const lines = linesThrough(3, { r: 0, c: 1 });
    expect(lines.map((line) => `${line.kind}:${line.index}`)).toEqual(['row:0', 'column:1']);
  });

  it('picks the anti-diagonal for a corner on it', () => {
    expect(linesThrough(4, { r: 3, c: 0 }).map((line) => line.kind)).toEqual(['row', 'column', 'antiDiagonal']);
  });
});

describe('tallyLine', () => {
  it('counts marks and empties along a line', () => {
    const board = Board.fromRows(['XO.', '.X.', 'O.X']);
    const [row0, , row2] = allLines(3);
    expect(tallyLine(board, row0)).toEqual({ x: 1, o: 1, empty: 1 });
    expect(tallyLine(board, row2)).toEqual({ x: 1, o: 1, empty: 1 });
    expect(tallyLine(board, allLines(3)[6])).toEqual({ x: 3, o: 0, empty: 0 });
    expect(tallyLine(board, allLines(3)[7])).toEqual({ x: 1, o: 1, empty: 1 });
  });
});
