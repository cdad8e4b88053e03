import type { Board } from '../board.js';
import { defaultWeights } from '../config.js';
import { allLines, tallyLine } from '../lines.js';
import type { HeuristicWeights, Player } from '../types.js';

function lineCount(n: number): number {
  return 2 * n + 2;
}

/**
 * Cost of leaving an opponent line one mark short of completion. Larger than
 * every open-line reward the board can hold at once.
 */
export function threatPenalty(n: number, weights: HeuristicWeights): number {
  return weights.threatFactor * lineCount(n) * Math.pow(weights.growthBase, n - 1);
}

/** Upper bound of |evaluate(...)| for any board of size n. */
export function heuristicBound(n: number, weights: HeuristicWeights): number {
  return lineCount(n) * (Math.pow(weights.growthBase, n) + threatPenalty(n, weights));
}

/**
 * Static score of a non-terminal position, positive when it favours
 * `forPlayer`. Only lines one side still owns outright count: such a line is
 * worth growthBase^k for k marks, and an opponent line with a single empty
 * cell costs an extra threat penalty.
 */
export function evaluate(board: Board, forPlayer: Player, weights: HeuristicWeights = defaultWeights()): number {
  const n = board.size;
  const penalty = threatPenalty(n, weights);
  let score = 0;

  for (const line of allLines(n)) {
    const tally = tallyLine(board, line);
    const mine = forPlayer === 'X' ? tally.x : tally.o;
    const theirs = forPlayer === 'X' ? tally.o : tally.x;

    if (mine > 0 && theirs > 0) {
      continue;
    }
    if (mine > 0) {
      score += Math.pow(weights.growthBase, mine);
    } else if (theirs > 0) {
      score -= Math.pow(weights.growthBase, theirs);
      if (theirs === n - 1 && tally.empty === 1) {
        score -= penalty;
      }
    }
  }

  return score;
}
