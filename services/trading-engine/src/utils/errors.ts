import { ZodError } from 'zod';

// Error types
export class InputError extends Error {
  public code: string = 'INPUT_ERROR';

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'InputError';
    if (code) this.code = code;
  }

  static fromZod(error: ZodError, what: string): InputError {
    const details = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new InputError(`Malformed ${what}: ${details}`);
  }
}

export class InvalidSnapshotError extends InputError {
  constructor(message: string) {
    super(message, 'INVALID_SNAPSHOT');
    this.name = 'InvalidSnapshotError';
  }
}

export class ConfigError extends Error {
  public code: string = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class TransientExecutionError extends Error {
  public code: string = 'TRANSIENT_EXECUTION_ERROR';

  constructor(message: string, public readonly attempts: number = 1) {
    super(message);
    this.name = 'TransientExecutionError';
  }
}

export class TerminalExecutionError extends Error {
  public code: string = 'TERMINAL_EXECUTION_ERROR';

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'TerminalExecutionError';
    if (code) this.code = code;
  }
}

/**
 * Raised by exchange clients when a request is refused. `retryable`
 * distinguishes throttling and venue hiccups from order rejections.
 */
export class ExchangeRequestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'ExchangeRequestError';
  }
}

export class HaltCondition extends Error {
  public code: string = 'HALT_CONDITION';

  constructor(
    public readonly reason: string,
    public readonly dailyPnl: number
  ) {
    super(`Trading halted: ${reason}`);
    this.name = 'HaltCondition';
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EAI_AGAIN',
  'EPIPE',
  'RATE_LIMITED',
]);

const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

/**
 * Sort a submission failure into retry-or-abandon.
 */
export function classifyExecutionError(error: unknown): 'transient' | 'terminal' {
  if (error instanceof TerminalExecutionError) return 'terminal';
  if (error instanceof TransientExecutionError) return 'transient';
  if (error instanceof ExchangeRequestError) return error.retryable ? 'transient' : 'terminal';
  const code = errorCode(error);
  if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) return 'transient';
  return 'terminal';
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const codeOf = (error: unknown): string => errorCode(error) ?? 'UNKNOWN_ERROR';
