import { describe, expect, it, vi } from 'vitest';
import { newBoard, resolveSearchConfig, type Board, type Move, type Player } from '@gridline/engine';
import { playGame } from './game.js';
import { SmartPlayer, type GamePlayer } from './players.js';

class ScriptedPlayer implements GamePlayer {
  readonly kind = 'human';

  constructor(
    readonly mark: Player,
    private readonly moves: Move[]
  ) {}

  async getMove(_board: Board): Promise<Move> {
    const move = this.moves.shift();
    if (!move) {
      throw new Error(`${this.mark} ran out of moves`);
    }
    return move;
  }
}

const at = (r: number, c: number): Move => ({ r, c });

describe('playGame', () => {
  it('stops at the first completed line and reports the winner', async () => {
    const x = new ScriptedPlayer('X', [at(0, 0), at(0, 1), at(0, 2)]);
    const o = new ScriptedPlayer('O', [at(1, 0), at(1, 1)]);
    const lines: string[] = [];
    const wait = vi.fn(async () => undefined);

    const winner = await playGame(newBoard(3), x, o, { output: (line) => lines.push(line), delayMs: 25, wait });

    expect(winner).toBe('X');
    expect(lines[0]).toBe('3x3 board. Need 3 in a row to win.');
    expect(lines[2]).toBe('X makes a move to square 0 (0, 0)');
    expect(lines[3]).toBe('| X |   |   |    | 0 | 1 | 2 |\n|   |   |   |    | 3 | 4 | 5 |\n|   |   |   |    | 6 | 7 | 8 |');
    expect(lines[lines.length - 1]).toBe('X wins!');
    expect(wait).toHaveBeenCalledTimes(4);
    expect(wait).toHaveBeenCalledWith(25);
  });

  it('reports a tie when the board fills without a line', async () => {
    const x = new ScriptedPlayer('X', [at(0, 0), at(0, 2), at(2, 1), at(1, 0), at(2, 2)]);
    const o = new ScriptedPlayer('O', [at(1, 1), at(0, 1), at(2, 0), at(1, 2)]);
    const lines: string[] = [];
    const board = newBoard(3);

    await expect(playGame(board, x, o, { output: (line) => lines.push(line) })).resolves.toBeNull();
    expect(lines[lines.length - 1]).toBe("It's a tie!");
    expect(board.toString()).toBe('XOX\nXOO\nOXX');
  });

  it('stays quiet when printing is off', async () => {
    const x = new ScriptedPlayer('X', [at(0, 0), at(0, 1), at(0, 2)]);
    const o = new ScriptedPlayer('O', [at(1, 0), at(1, 1)]);
    const output = vi.fn();
    const wait = vi.fn(async () => undefined);

    await expect(playGame(newBoard(3), x, o, { print: false, output, delayMs: 10, wait })).resolves.toBe('X');
    expect(output).not.toHaveBeenCalled();
    expect(wait).not.toHaveBeenCalled();
  });

  it('rejects players with the wrong marks', async () => {
    const a = new ScriptedPlayer('O', []);
    const b = new ScriptedPlayer('X', []);
    await expect(playGame(newBoard(3), a, b, { print: false })).rejects.toThrow('Expected X and O players, got O and X');
  });

  it('draws when both sides search the full 3x3 tree', async () => {
    const config = resolveSearchConfig();
    const x = new SmartPlayer('X', config, { random: () => 0 });
    const o = new SmartPlayer('O', config);
    await expect(playGame(newBoard(3), x, o, { print: false })).resolves.toBeNull();
    expect(o.nodeCounts.length).toBe(4);
  });
});
