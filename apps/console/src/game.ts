import { setTimeout as sleep } from 'node:timers/promises';
import type { Board, Player } from '@gridline/engine';
import type { GamePlayer } from './players.js';
import { formatMove, renderBoard, renderIndexGuide } from './render.js';

export interface PlayOptions {
  print?: boolean;
  /** Pause after each move while printing, so a human can follow along. */
  delayMs?: number;
  output?: (line: string) => void;
  wait?: (ms: number) => Promise<unknown>;
}

/**
 * Runs a game to completion, X first. Resolves to the winning mark, or null
 * for a tie.
 */
export async function playGame(
  board: Board,
  x: GamePlayer,
  o: GamePlayer,
  options: PlayOptions = {}
): Promise<Player | null> {
  if (x.mark !== 'X' || o.mark !== 'O') {
    throw new Error(`Expected X and O players, got ${x.mark} and ${o.mark}`);
  }
  const print = options.print ?? true;
  const delayMs = options.delayMs ?? 0;
  const out = options.output ?? console.log;
  const wait = options.wait ?? sleep;
  const n = board.size;

  if (print) {
    out(`${n}x${n} board. Need ${n} in a row to win.`);
    out(renderIndexGuide(n));
  }

  let current = x;
  while (!board.isFull()) {
    const move = await current.getMove(board);
    board.place(move, current.mark);

    if (print) {
      out(`${current.mark} makes a move to ${formatMove(move, n)}`);
      out(renderBoard(board));
      out('');
    }

    if (board.checkWin(move)) {
      if (print) {
        out(`${current.mark} wins!`);
      }
      return current.mark;
    }

    current = current === x ? o : x;

    if (print && delayMs > 0) {
      await wait(delayMs);
    }
  }

  if (print) {
    out("It's a tie!");
  }
  return null;
}
