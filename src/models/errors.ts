export type GameEngineErrorCode =
  | 'MALFORMED_GAME'
  | 'INTRACTABLE_GAME'
  | 'NO_CONVERGENCE'
  | 'INTERNAL_INCONSISTENCY';

export type GameEngineErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: GameEngineErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

/**
 * Base of every typed failure the engine raises.
 * The boundary layer maps `code` to a response status.
 */
export class GameEngineError extends Error {
  readonly code: GameEngineErrorCode;
  readonly context?: GameEngineErrorContext;

  constructor(code: GameEngineErrorCode, message: string, context?: GameEngineErrorContext) {
    super(formatMessage(message, context));
    this.name = 'GameEngineError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

/** Parameters or payoffs produce an inconsistent model. */
export class MalformedGameError extends GameEngineError {
  constructor(message: string, context?: GameEngineErrorContext) {
    super('MALFORMED_GAME', message, context);
    this.name = 'MalformedGameError';
  }
}

/** Strategy space exceeds a configured enumeration ceiling. */
export class IntractableGameError extends GameEngineError {
  constructor(message: string, context?: GameEngineErrorContext) {
    super('INTRACTABLE_GAME', message, context);
    this.name = 'IntractableGameError';
  }
}

/**
 * An iterative heuristic did not stabilize within its budget.
 * Only raised under `strict_convergence`; otherwise the result is returned
 * marked approximate.
 */
export class NoConvergenceError extends GameEngineError {
  constructor(message: string, context?: GameEngineErrorContext) {
    super('NO_CONVERGENCE', message, context);
    this.name = 'NoConvergenceError';
  }
}

/** A computed result violates a mathematical invariant. Always a solver bug. */
export class InternalInconsistencyError extends GameEngineError {
  constructor(message: string, context?: GameEngineErrorContext) {
    super('INTERNAL_INCONSISTENCY', message, context);
    this.name = 'InternalInconsistencyError';
  }
}

export function isGameEngineError(value: unknown): value is GameEngineError {
  return value instanceof GameEngineError;
}
