export const ErrorCodes = {
  ERR_INVALID_ARGUMENT: 'ERR_INVALID_ARGUMENT',
  ERR_MISSING_ARGUMENT: 'ERR_MISSING_ARGUMENT',
  ERR_DEFINITION: 'ERR_DEFINITION',
  ERR_NO_CHAIN_ID: 'ERR_NO_CHAIN_ID',
  ERR_CONTEXT_LOAD: 'ERR_CONTEXT_LOAD',
  ERR_UNKNOWN_ALIAS: 'ERR_UNKNOWN_ALIAS',
  ERR_INTERNAL: 'ERR_INTERNAL',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class CliError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

/** A supplied (or defaulted) argument value the descriptor's parser rejected. */
export class ArgumentParseError extends CliError {
  constructor(
    public readonly key: string,
    public readonly raw: string | undefined,
    public readonly reason: string,
  ) {
    super(
      raw === undefined ? ErrorCodes.ERR_MISSING_ARGUMENT : ErrorCodes.ERR_INVALID_ARGUMENT,
      raw === undefined
        ? `missing required argument '--${key}'`
        : `invalid value '${raw}' for '--${key}': ${reason}`,
    );
    this.name = 'ArgumentParseError';
  }
}

export class ContextError extends CliError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'ContextError';
  }
}
