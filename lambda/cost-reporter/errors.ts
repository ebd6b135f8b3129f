export type FailureStage = 'config' | 'fetch' | 'parse' | 'send';

export class CostReportError extends Error {
  readonly stage: FailureStage;

  constructor(stage: FailureStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CostReportError';
    this.stage = stage;
  }
}

export class ConfigError extends CostReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

export class FetchError extends CostReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fetch', message, options);
    this.name = 'FetchError';
  }
}

export class ParseError extends CostReportError {
  readonly rawAmount: string;

  constructor(message: string, rawAmount: string) {
    super('parse', message);
    this.name = 'ParseError';
    this.rawAmount = rawAmount;
  }
}

export class SendError extends CostReportError {
  // Undefined when the request never produced a response.
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('send', message, options);
    this.name = 'SendError';
    this.status = options?.status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
