import { performance } from 'node:perf_hooks';
import {
  autoSearchConfig,
  chooseMove,
  newBoard,
  type Clock,
  type Move,
  type Player,
  type SearchConfig,
} from '@gridline/engine';

// Pruning and ordering are switched off one at a time to show what each saves.
export type BenchMode = 'PRUNE_ON' | 'ORDER_OFF' | 'PRUNE_OFF';

export const BENCH_MODES: readonly BenchMode[] = ['PRUNE_ON', 'ORDER_OFF', 'PRUNE_OFF'];

const MODE_SWITCHES: Record<BenchMode, Pick<SearchConfig, 'pruning' | 'moveOrdering'>> = {
  PRUNE_ON: { pruning: true, moveOrdering: true },
  ORDER_OFF: { pruning: true, moveOrdering: false },
  PRUNE_OFF: { pruning: false, moveOrdering: true },
};

export type Placement = [Move, Player];

export interface BenchCase {
  size: number;
  maxDepth: number | null;
  timeBudgetMs: number;
  repeats: number;
}

export interface ComparisonRow {
  size: number;
  maxDepth: number | null;
  timeBudgetMs: number;
  mode: BenchMode;
  avgNodes: number;
  avgMs: number;
  nodesPerSec: number;
}

export const DEFAULT_CASES: readonly BenchCase[] = [
  { size: 3, maxDepth: null, timeBudgetMs: 1000, repeats: 5 },
  { size: 4, maxDepth: 4, timeBudgetMs: 1000, repeats: 3 },
  { size: 5, maxDepth: 4, timeBudgetMs: 1000, repeats: 3 },
  { size: 6, maxDepth: 4, timeBudgetMs: 1000, repeats: 3 },
  { size: 7, maxDepth: 4, timeBudgetMs: 1000, repeats: 3 },
];

/**
 * A handful of opening positions per size, X to move, so that the modes are
 * compared on the same mid-game trees.
 */
export function startPositions(n: number): Placement[][] {
  const at = (r: number, c: number): Move => ({ r, c });
  if (n % 2 === 1) {
    const m = (n - 1) / 2;
    const center = at(m, m);
    return [
      [[center, 'O']],
      [[center, 'X']],
      [[center, 'O'], [at(0, 0), 'X']],
      [[center, 'X'], [at(0, n - 1), 'O']],
      [[at(0, 0), 'X'], [at(n - 1, n - 1), 'O']],
      [[at(0, 0), 'X'], [at(m, m - 1), 'O']],
    ];
  }
  const a = n / 2 - 1;
  const b = n / 2;
  return [
    [[at(a, a), 'O']],
    [[at(a, b), 'X']],
    [[at(a, a), 'X'], [at(b, b), 'O']],
    [[at(0, 0), 'X'], [at(b, a), 'O']],
    [[at(0, 0), 'X'], [at(n - 1, n - 1), 'O']],
    [[at(0, 0), 'O'], [at(0, n - 2), 'X']],
  ];
}

export function benchmarkOneMove(
  size: number,
  config: SearchConfig,
  start: Placement[],
  clock: Clock = () => performance.now()
): { nodes: number; ms: number } {
  const board = newBoard(size);
  for (const [move, mark] of start) {
    board.place(move, mark);
  }
  const result = chooseMove(board, 'X', config, clock);
  return { nodes: result.nodesVisited, ms: result.elapsedMs };
}

function mean(values: number[]): number {
  return values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

export function runComparisonBench(
  cases: readonly BenchCase[] = DEFAULT_CASES,
  clock: Clock = () => performance.now()
): ComparisonRow[] {
  const rows: ComparisonRow[] = [];
  for (const benchCase of cases) {
    const positions = startPositions(benchCase.size);
    for (const mode of BENCH_MODES) {
      const config: SearchConfig = {
        ...autoSearchConfig(benchCase.size),
        maxDepth: benchCase.maxDepth,
        timeBudgetMs: benchCase.timeBudgetMs,
        ...MODE_SWITCHES[mode],
      };
      const nodes: number[] = [];
      const times: number[] = [];
      for (const start of positions) {
        for (let i = 0; i < benchCase.repeats; i++) {
          const run = benchmarkOneMove(benchCase.size, config, start, clock);
          nodes.push(run.nodes);
          times.push(run.ms);
        }
      }
      const avgNodes = Math.trunc(mean(nodes));
      const avgMs = mean(times);
      rows.push({
        size: benchCase.size,
        maxDepth: benchCase.maxDepth,
        timeBudgetMs: benchCase.timeBudgetMs,
        mode,
        avgNodes,
        avgMs,
        nodesPerSec: avgMs > 0 ? avgNodes / (avgMs / 1000) : 0,
      });
    }
  }
  return rows;
}

export function formatComparisonTable(rows: readonly ComparisonRow[]): string {
  const lines = ['Board | Depth | Time(ms) | Mode       | avg_nodes |  avg_ms | nodes/sec'];
  let previousSize: number | null = null;
  for (const row of rows) {
    if (previousSize !== null && row.size !== previousSize) {
      lines.push('');
    }
    previousSize = row.size;
    const board = `${row.size}x${row.size}`.padEnd(5);
    const depth = String(row.maxDepth ?? 'auto').padStart(5);
    const time = String(row.timeBudgetMs).padStart(8);
    lines.push(
      `${board} | ${depth} | ${time} | ${row.mode.padEnd(10)} | ${String(row.avgNodes).padStart(9)} | ` +
        `${row.avgMs.toFixed(2).padStart(7)} | ${row.nodesPerSec.toFixed(0).padStart(9)}`
    );
  }
  return lines.join('\n');
}
