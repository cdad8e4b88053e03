export * from './types.js';
export * from './errors.js';
export {
  autoSearchConfig,
  defaultSearchConfig,
  defaultWeights,
  resolveSearchConfig,
  searchConfigSchema,
  validateSearchConfig,
  type SearchConfigInput,
} from './config.js';
export { Board, newBoard, inBounds, nextPlayer } from './board.js';
export { allLines, linesThrough, tallyLine } from './lines.js';
export { chooseMove } from './ai/minimax.js';
export { evaluate, heuristicBound, threatPenalty } from './ai/heuristics.js';
export { orderMoves, centerCells, distanceToCenter } from './ai/ordering.js';
