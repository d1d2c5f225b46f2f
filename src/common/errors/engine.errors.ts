export enum EngineErrorKind {
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  CIRCUIT_BREAKER_OPEN = 'CIRCUIT_BREAKER_OPEN',
  REDISTRIBUTION_EXHAUSTED = 'REDISTRIBUTION_EXHAUSTED',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  DIVERSIFICATION_LIMIT = 'DIVERSIFICATION_LIMIT',
}

export type ErrorContext = Record<string, number | string | boolean>;

/**
 * Базовая ошибка движка. Восстановимые ошибки пропускают инструмент
 * в текущем цикле, фатальные прерывают запуск.
 */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  readonly context: ErrorContext;
  readonly recoverable: boolean;

  constructor(kind: EngineErrorKind, message: string, context: ErrorContext = {}, recoverable = true) {
    super(message);
    this.name = 'EngineError';
    this.kind = kind;
    this.context = context;
    this.recoverable = recoverable;
  }
}

export class InvalidConfigurationError extends EngineError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      EngineErrorKind.INVALID_CONFIGURATION,
      `Некорректная конфигурация: ${problems.join('; ')}`,
      { problems: problems.length },
      false,
    );
    this.name = 'InvalidConfigurationError';
    this.problems = problems;
  }
}

export class ExecutionError extends EngineError {
  constructor(message: string, context: ErrorContext = {}) {
    super(EngineErrorKind.EXECUTION_FAILED, message, context, true);
    this.name = 'ExecutionError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function formatContext(context: ErrorContext): string {
  return Object.entries(context)
    .map(([key, value]) => `${key}=${typeof value === 'number' ? value.toFixed(2) : value}`)
    .join(', ');
}
