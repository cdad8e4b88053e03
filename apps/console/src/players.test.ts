import { describe, expect, it, vi } from 'vitest';
import { Board, newBoard, resolveSearchConfig, SearchMisuseError } from '@gridline/engine';
import { HumanPlayer, RandomPlayer, SmartPlayer } from './players.js';

describe('HumanPlayer', () => {
  it('re-prompts until it gets an empty square', async () => {
    const board = newBoard(3);
    board.place({ r: 0, c: 0 }, 'O');
    const answers = ['9', '0', 'nope', '4'];
    const prompt = vi.fn(async () => answers.shift() ?? '');
    const print = vi.fn();
    const player = new HumanPlayer('X', prompt, print);

    await expect(player.getMove(board)).resolves.toEqual({ r: 1, c: 1 });
    expect(prompt).toHaveBeenCalledTimes(4);
    expect(prompt).toHaveBeenCalledWith("X's turn. Input move (0-8 or row,col): ");
    expect(print).toHaveBeenCalledTimes(3);
    expect(print).toHaveBeenCalledWith('Invalid square. Try again.');
  });
});

describe('RandomPlayer', () => {
  it('picks among the legal moves using the injected source', async () => {
    const board = Board.fromRows(['XO.', '.X.', 'O..']);
    await expect(new RandomPlayer('O', () => 0).getMove(board)).resolves.toEqual({ r: 0, c: 2 });
    await expect(new RandomPlayer('O', () => 0.99).getMove(board)).resolves.toEqual({ r: 2, c: 2 });
  });

  it('fails on a full board', async () => {
    const board = Board.fromRows(['XOX', 'XOO', 'OXX']);
    await expect(new RandomPlayer('X').getMove(board)).rejects.toThrow(SearchMisuseError);
  });
});

describe('SmartPlayer', () => {
  it('opens in the center of an odd board without searching', async () => {
    const player = new SmartPlayer('X', resolveSearchConfig());
    await expect(player.getMove(newBoard(5))).resolves.toEqual({ r: 2, c: 2 });
    expect(player.nodeCounts).toEqual([0]);
    expect(player.moveTimes).toEqual([0]);
  });

  it('opens on one of the central cells of an even board', async () => {
    const player = new SmartPlayer('X', resolveSearchConfig(), { random: () => 0.5 });
    await expect(player.getMove(newBoard(4))).resolves.toEqual({ r: 2, c: 1 });
  });

  it('searches once the board has marks', async () => {
    const player = new SmartPlayer('X', resolveSearchConfig());
    await expect(player.getMove(Board.fromRows(['XO.', '.X.', '...']))).resolves.toEqual({ r: 2, c: 2 });
    expect(player.nodeCounts).toHaveLength(1);
    expect(player.nodeCounts[0]).toBeGreaterThan(1);
  });

  it('logs search metrics when verbose', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    try {
      const player = new SmartPlayer('O', resolveSearchConfig(), { verbose: true });
      await player.getMove(Board.fromRows(['.OO', '.X.', 'X..']));
      expect(debug).toHaveBeenCalledWith(
        '[smart] Move chosen',
        expect.objectContaining({ mark: 'O', move: { r: 0, c: 0 } })
      );
    } finally {
      debug.mockRestore();
    }
  });
});
