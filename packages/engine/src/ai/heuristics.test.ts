import { describe, expect, it } from 'vitest';
import { Board } from '../board.js';
import { evaluate, heuristicBound, threatPenalty } from './heuristics.js';

const weights = { growthBase: 4, threatFactor: 1 };

describe('evaluate', () => {
  it('scores an empty board as even', () => {
    expect(evaluate(Board.fromRows(['...', '...', '...']), 'X')).toBe(0);
  });

  it('rewards more marks on an uncontested line', () => {
    const one = evaluate(Board.fromRows(['X..', '...', '...']), 'X', weights);
    const two = evaluate(Board.fromRows(['XX.', '...', '...']), 'X', weights);
    expect(one).toBe(12);
    expect(two).toBe(28);
    expect(two).toBeGreaterThan(one);
  });

  it('prefers lines the player owns over lines the opponent owns', () => {
    const mine = evaluate(Board.fromRows(['XX.', '.O.', '...']), 'X', weights);
    const theirs = evaluate(Board.fromRows(['OO.', '.X.', '...']), 'X', weights);
    expect(mine).toBe(12);
    expect(theirs).toBe(-140);
  });

  it('scores a blocked threat above an open one', () => {
    const open = evaluate(Board.fromRows(['.OO', '.X.', '...']), 'X', weights);
    const blocked = evaluate(Board.fromRows(['XOO', '.X.', '...']), 'X', weights);
    expect(open).toBe(-140);
    expect(blocked).toBe(20);
  });

  it('lets an immediate threat outweigh positional reward', () => {
    expect(evaluate(Board.fromRows(['.OO', 'X..', 'X.X']), 'X', weights)).toBe(-108);
  });

  it('ignores contested lines', () => {
    expect(evaluate(Board.fromRows(['XO.', 'OX.', '...']), 'X', weights)).toBe(20);
  });

  it('follows the configured weights', () => {
    expect(evaluate(Board.fromRows(['XX.', '...', '...']), 'X', { growthBase: 10, threatFactor: 2 })).toBe(130);
  });
});

describe('threatPenalty and heuristicBound', () => {
  it('scales with board size', () => {
    expect(threatPenalty(3, weights)).toBe(128);
    expect(threatPenalty(4, weights)).toBe(640);
    expect(heuristicBound(3, weights)).toBe(1536);
  });

  it('bounds the evaluation of a crowded board', () => {
    const board = Board.fromRows(['XX.X', '.XX.', 'X..X', 'O.OO']);
    expect(Math.abs(evaluate(board, 'X', weights))).toBeLessThan(heuristicBound(4, weights));
    expect(Math.abs(evaluate(board, 'O', weights))).toBeLessThan(heuristicBound(4, weights));
  });
});
