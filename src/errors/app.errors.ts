/**
 * Errors that stop the bot during startup. Once trading runs, exchange and
 * feed failures are reported as result values and log lines instead.
 */

export type StartupErrorCode = "CONFIG_INVALID" | "EXCHANGE_UNAVAILABLE";

export interface StartupErrorOptions {
  cause?: Error;
}

export class StartupError extends Error {
  readonly code: StartupErrorCode;

  constructor(message: string, code: StartupErrorCode, options?: StartupErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A setting from the environment or the market map is missing or out of
 * range. `variable` names the offending key when there is one.
 */
export class ConfigurationError extends StartupError {
  readonly variable?: string;

  constructor(message: string, options?: StartupErrorOptions & { variable?: string }) {
    super(message, "CONFIG_INVALID", options);
    this.variable = options?.variable;
  }
}

/**
 * The CLOB could not be reached or refused to issue API credentials.
 */
export class ExchangeUnavailableError extends StartupError {
  readonly endpoint: string;

  constructor(message: string, endpoint: string, options?: StartupErrorOptions) {
    super(message, "EXCHANGE_UNAVAILABLE", options);
    this.endpoint = endpoint;
  }
}
