import { nextPlayer, type Board } from '../board.js';
import { resolveSearchConfig, type SearchConfigInput } from '../config.js';
import { InvalidConfigError, SearchMisuseError } from '../errors.js';
import type { Clock, HeuristicWeights, Move, Player, SearchConfig, SearchResult } from '../types.js';
import { evaluate, heuristicBound } from './heuristics.js';
import { orderMoves } from './ordering.js';

interface SearchContext {
  board: Board;
  root: Player;
  config: SearchConfig;
  winScore: number;
  deadline: number | null;
  clock: Clock;
  nodes: number;
  timedOut: boolean;
}

function deadlinePassed(ctx: SearchContext): boolean {
  if (ctx.deadline !== null && ctx.clock() >= ctx.deadline) {
    ctx.timedOut = true;
    return true;
  }
  return false;
}

function candidates(ctx: SearchContext): Move[] {
  const moves = ctx.board.legalMoves();
  return ctx.config.moveOrdering ? orderMoves(moves, ctx.board.size) : Array.from(moves);
}

// Terminal scores sit up to n*n above winScore and must stay exact integers.
function winScoreFor(n: number, weights: HeuristicWeights): number {
  const winScore = heuristicBound(n, weights) + 1;
  if (winScore + n * n > Number.MAX_SAFE_INTEGER) {
    throw new InvalidConfigError(
      `Heuristic weights ${weights.growthBase}/${weights.threatFactor} overflow the score range of a ${n}x${n} board`
    );
  }
  return winScore;
}

// Remaining empties make quicker wins (and slower losses) score higher.
function terminalScore(ctx: SearchContext, winner: Player): number {
  const rem = ctx.board.counts.empty + 1;
  return winner === ctx.root ? ctx.winScore + rem : -(ctx.winScore + rem);
}

function search(
  ctx: SearchContext,
  depth: number,
  alpha: number,
  beta: number,
  maximizing: boolean,
  lastMove: Move
): number {
  ctx.nodes++;

  const winner = ctx.board.checkWin(lastMove);
  if (winner) {
    return terminalScore(ctx, winner);
  }
  if (ctx.board.isFull()) {
    return 0;
  }

  const { maxDepth } = ctx.config;
  if ((maxDepth !== null && depth >= maxDepth) || deadlinePassed(ctx)) {
    return evaluate(ctx.board, ctx.root, ctx.config.weights);
  }

  const mark = maximizing ? ctx.root : nextPlayer(ctx.root);
  let best = maximizing ? -Infinity : Infinity;

  const moves = candidates(ctx);
  for (let i = 0; i < moves.length; i++) {
    const move = moves[i];
    ctx.board.place(move, mark);
    const score = search(ctx, depth + 1, alpha, beta, !maximizing, move);
    ctx.board.undo(move);

    if (maximizing) {
      if (score > best) best = score;
      if (best > alpha) alpha = best;
    } else {
      if (score < best) best = score;
      if (best < beta) beta = best;
    }
    if (ctx.config.pruning && alpha >= beta) {
      break;
    }
    if (i < moves.length - 1 && deadlinePassed(ctx)) {
      break;
    }
  }

  return best;
}

/**
 * Picks a move for `player` on a non-terminal board. The board is mutated
 * during the search and restored before returning.
 *
 * Ties go to the earliest candidate in search order. If the time budget is
 * already spent before the first candidate is searched, the first candidate
 * is returned as is. `timedOut` is set only when the deadline cut some part of
 * the tree. Throws `InvalidConfigError` when the weights would push scores for
 * this board size past the safe integer range.
 */
export function chooseMove(
  board: Board,
  player: Player,
  config: SearchConfigInput = {},
  clock: Clock = Date.now
): SearchResult {
  const resolved = resolveSearchConfig(config);
  if (board.isFull()) {
    throw new SearchMisuseError('Cannot search a full board');
  }
  const decided = board.winner();
  if (decided) {
    throw new SearchMisuseError(`Cannot search a board already won by ${decided}`);
  }

  const winScore = winScoreFor(board.size, resolved.weights);
  const started = clock();
  const ctx: SearchContext = {
    board,
    root: player,
    config: resolved,
    winScore,
    deadline: resolved.timeBudgetMs === null ? null : started + resolved.timeBudgetMs,
    clock,
    nodes: 1,
    timedOut: false,
  };

  const moves = candidates(ctx);
  let bestMove: Move | null = null;
  let bestScore = -Infinity;

  if (deadlinePassed(ctx)) {
    bestMove = moves[0] ?? null;
    bestScore = evaluate(board, player, resolved.weights);
  } else {
    let alpha = -Infinity;
    const beta = Infinity;
    for (let i = 0; i < moves.length; i++) {
      const move = moves[i];
      board.place(move, player);
      const score = search(ctx, 1, alpha, beta, false, move);
      board.undo(move);

      if (score > bestScore) {
        bestScore = score;
        bestMove = move;
      }
      if (bestScore > alpha) {
        alpha = bestScore;
      }
      if (i < moves.length - 1 && deadlinePassed(ctx)) {
        break;
      }
    }
  }

  return Object.freeze({
    bestMove,
    score: bestScore,
    nodesVisited: ctx.nodes,
    timedOut: ctx.timedOut,
    elapsedMs: clock() - started,
  });
}
