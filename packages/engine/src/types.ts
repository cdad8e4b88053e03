export type Player = 'X' | 'O';
export type Cell = Player | null;

export interface Move {
  r: number;
  c: number;
}

export type LineKind = 'row' | 'column' | 'diagonal' | 'antiDiagonal';

export interface Line {
  readonly kind: LineKind;
  readonly index: number;
  readonly cells: readonly Readonly<Move>[];
}

export interface LineTally {
  x: number;
  o: number;
  empty: number;
}

export interface HeuristicWeights {
  /** An open line holding k marks of one side is worth growthBase^k. */
  growthBase: number;
  /** Scales the penalty for an opponent line one mark short of completion. */
  threatFactor: number;
}

export interface SearchConfig {
  maxDepth: number | null; // null = unbounded
  timeBudgetMs: number | null; // null = unbounded
  pruning: boolean;
  moveOrdering: boolean;
  weights: HeuristicWeights;
}

export interface SearchResult {
  bestMove: Move | null;
  score: number;
  nodesVisited: number;
  timedOut: boolean;
  elapsedMs: number;
}

export type Clock = () => number;
