import { autoSearchConfig, newBoard, nextPlayer, type Player } from '@gridline/engine';
import { playGame } from '../game.js';
import { RandomPlayer, SmartPlayer, type Random } from '../players.js';

export interface MatchBenchOptions {
  sizes: readonly number[];
  games: number;
  /** null = exhaustive on 3x3, depth 4 elsewhere. */
  maxDepth: number | null;
  timeBudgetMs: number | null;
  random: Random;
}

export interface MatchRow {
  size: number;
  maxDepth: number | null;
  role: Player;
  games: number;
  wins: number;
  draws: number;
  losses: number;
}

export const defaultMatchOptions = (): MatchBenchOptions => ({
  sizes: [3, 4, 5],
  games: 20,
  maxDepth: null,
  timeBudgetMs: 200,
  random: Math.random,
});

export function depthFor(size: number, maxDepth: number | null): number | null {
  if (maxDepth !== null) {
    return maxDepth;
  }
  return size === 3 ? null : 4;
}

/** One smart-vs-random game; resolves to the winner or null for a tie. */
export async function playSmartVsRandom(
  size: number,
  smartAs: Player,
  options: Pick<MatchBenchOptions, 'maxDepth' | 'timeBudgetMs' | 'random'>
): Promise<Player | null> {
  const depth = depthFor(size, options.maxDepth);
  const config = {
    ...autoSearchConfig(size),
    maxDepth: depth,
    timeBudgetMs: size === 3 ? null : options.timeBudgetMs,
  };
  const smart = new SmartPlayer(smartAs, config, { random: options.random });
  const rnd = new RandomPlayer(nextPlayer(smartAs), options.random);
  const [x, o] = smartAs === 'X' ? [smart, rnd] : [rnd, smart];
  return playGame(newBoard(size), x, o, { print: false });
}

export async function runMatchBench(overrides: Partial<MatchBenchOptions> = {}): Promise<MatchRow[]> {
  const options = { ...defaultMatchOptions(), ...overrides };
  const rows: MatchRow[] = [];
  for (const size of options.sizes) {
    for (const role of ['X', 'O'] as const) {
      let wins = 0;
      let draws = 0;
      let losses = 0;
      for (let i = 0; i < options.games; i++) {
        const result = await playSmartVsRandom(size, role, options);
        if (result === role) wins++;
        else if (result === null) draws++;
        else losses++;
      }
      console.info('[bench] Series finished', { size, role, wins, draws, losses });
      rows.push({ size, maxDepth: depthFor(size, options.maxDepth), role, games: options.games, wins, draws, losses });
    }
  }
  return rows;
}

function percent(count: number, total: number): string {
  return `${((count / total) * 100).toFixed(2)}%`.padStart(7);
}

export function formatMatchTable(rows: readonly MatchRow[]): string {
  const lines = ['Size | Depth  | Role  | Games  | Wins  | Draws  | Losses  |  Win %  |  Draw % |  Loss %'];
  for (const row of rows) {
    const depth = String(row.maxDepth ?? 'auto').padEnd(6);
    lines.push(
      `${String(row.size).padEnd(4)} | ${depth} | ${row.role.padStart(3).padEnd(5)} | ${String(row.games).padStart(6)} | ` +
        `${String(row.wins).padStart(5)} | ${String(row.draws).padStart(6)} | ${String(row.losses).padStart(7)} | ` +
        `${percent(row.wins, row.games)} | ${percent(row.draws, row.games)} | ${percent(row.losses, row.games)}`
    );
  }
  return lines.join('\n');
}
