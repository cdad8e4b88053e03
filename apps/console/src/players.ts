import {
  centerCells,
  chooseMove,
  SearchMisuseError,
  type Board,
  type Move,
  type Player,
  type SearchConfig,
} from '@gridline/engine';
import { parseSquare } from './render.js';

export interface GamePlayer {
  readonly mark: Player;
  readonly kind: 'human' | 'random' | 'smart';
  getMove(board: Board): Promise<Move>;
}

export type Prompt = (question: string) => Promise<string>;
export type Random = () => number;

function randomChoice<T>(items: T[], random: Random): T {
  return items[Math.floor(random() * items.length)];
}

export class HumanPlayer implements GamePlayer {
  readonly kind = 'human';

  constructor(
    readonly mark: Player,
    private readonly prompt: Prompt,
    private readonly print: (line: string) => void = console.log
  ) {}

  async getMove(board: Board): Promise<Move> {
    const last = board.size * board.size - 1;
    while (true) {
      const answer = await this.prompt(`${this.mark}'s turn. Input move (0-${last} or row,col): `);
      const move = parseSquare(answer, board.size);
      if (move && board.get(move) === null) {
        return move;
      }
      this.print('Invalid square. Try again.');
    }
  }
}

export class RandomPlayer implements GamePlayer {
  readonly kind = 'random';

  constructor(
    readonly mark: Player,
    private readonly random: Random = Math.random
  ) {}

  async getMove(board: Board): Promise<Move> {
    const moves = [...board.legalMoves()];
    if (moves.length === 0) {
      throw new SearchMisuseError('No legal moves left');
    }
    return randomChoice(moves, this.random);
  }
}

export interface SmartPlayerOptions {
  random?: Random;
  verbose?: boolean;
}

/**
 * Engine-backed player. Opens in the center without searching (one of the
 * four central cells on even boards) and keeps per-move search statistics.
 */
export class SmartPlayer implements GamePlayer {
  readonly kind = 'smart';
  readonly nodeCounts: number[] = [];
  readonly moveTimes: number[] = [];
  private readonly random: Random;
  private readonly verbose: boolean;

  constructor(
    readonly mark: Player,
    readonly config: SearchConfig,
    options: SmartPlayerOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.verbose = options.verbose ?? false;
  }

  async getMove(board: Board): Promise<Move> {
    if (board.counts.empty === board.size * board.size) {
      const move = randomChoice(centerCells(board.size), this.random);
      this.nodeCounts.push(0);
      this.moveTimes.push(0);
      return move;
    }

    const result = chooseMove(board, this.mark, this.config);
    this.nodeCounts.push(result.nodesVisited);
    this.moveTimes.push(result.elapsedMs);
    if (this.verbose) {
      console.debug('[smart] Move chosen', {
        mark: this.mark,
        move: result.bestMove,
        score: result.score,
        nodes: result.nodesVisited,
        elapsedMs: result.elapsedMs,
        timedOut: result.timedOut,
      });
    }
    if (!result.bestMove) {
      throw new SearchMisuseError('Search returned no move');
    }
    return result.bestMove;
  }
}
