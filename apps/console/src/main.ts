import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { newBoard, type Player } from '@gridline/engine';
import { formatComparisonTable, runComparisonBench } from './bench/comparison.js';
import { formatMatchTable, runMatchBench } from './bench/match.js';
import { loadAppConfig, searchConfigFor, type AppConfig, type PlayerKind } from './config.js';
import { describeError } from './describe-error.js';
import { playGame } from './game.js';
import { HumanPlayer, RandomPlayer, SmartPlayer, type GamePlayer, type Prompt } from './players.js';

function createPlayer(kind: PlayerKind, mark: Player, config: AppConfig, prompt: Prompt): GamePlayer {
  switch (kind) {
    case 'human':
      return new HumanPlayer(mark, prompt);
    case 'random':
      return new RandomPlayer(mark);
    case 'smart':
      return new SmartPlayer(mark, searchConfigFor(config), { verbose: !config.quiet });
  }
}

async function play(config: AppConfig): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const prompt: Prompt = (question) => rl.question(question);
    const x = createPlayer(config.x, 'X', config, prompt);
    const o = createPlayer(config.o, 'O', config, prompt);
    console.info('[console] Starting game', { size: config.size, x: config.x, o: config.o });
    const winner = await playGame(newBoard(config.size), x, o, {
      print: true,
      delayMs: config.moveDelayMs,
    });
    console.info('[console] Game over', { winner: winner ?? 'tie' });
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const config = loadAppConfig(process.argv.slice(2), process.env);
  switch (config.command) {
    case 'compare':
      console.log(formatComparisonTable(runComparisonBench()));
      return;
    case 'match': {
      const rows = await runMatchBench({
        maxDepth: config.maxDepth ?? null,
        timeBudgetMs: config.timeBudgetMs ?? 200,
      });
      console.log(formatMatchTable(rows));
      return;
    }
    case 'play':
      await play(config);
      return;
  }
}

main().catch((err) => {
  console.error('[console] Fatal error', describeError(err));
  process.exitCode = 1;
});
