import type { Move } from './types.js';

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidMoveError extends EngineError {
  readonly move: Move;

  constructor(move: Move, reason: string) {
    super(`Illegal move (${move.r},${move.c}): ${reason}`);
    this.move = { r: move.r, c: move.c };
  }
}

export class InvalidSizeError extends EngineError {
  readonly size: number;

  constructor(size: number) {
    super(`Board size must be an integer >= 3, got ${size}`);
    this.size = size;
  }
}

export class SearchMisuseError extends EngineError {}

export class InvalidConfigError extends EngineError {}
