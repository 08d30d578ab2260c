export class InterpreterError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InterpreterError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends InterpreterError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class LLMError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('LLM', message, options);
    this.name = 'LLMError';
  }
}

export class FallbackError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('FALLBACK', message, options);
    this.name = 'FallbackError';
  }
}

export class VocabularyError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('VOCABULARY', message, options);
    this.name = 'VocabularyError';
  }
}

export class LexiconError extends InterpreterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'LEXICON_ERROR', options);
    this.name = 'LexiconError';
  }
}

export class ConfigError extends InterpreterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
