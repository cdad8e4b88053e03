import { EngineError, InvalidMoveError, InvalidSizeError } from '@gridline/engine';

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const details: Record<string, unknown> = {
      name: error.name,
      message: error.message,
    };
    if (error instanceof InvalidMoveError) {
      details.move = error.move;
    } else if (error instanceof InvalidSizeError) {
      details.size = error.size;
    }
    // Engine errors are caller bugs with a complete message; the stack adds nothing.
    if (!(error instanceof EngineError) && typeof error.stack === 'string') {
      details.stack = error.stack;
    }
    return details;
  }
  return { message: String(error) };
}
