/**
 * Structured CLI errors
 * Error type + context record + user-facing text from format()
 */

export const USAGE = '  Usage: ipkcpc -h <host> -p <port> -m <mode>';

export enum ErrorType {
  MissingArguments = 'missing_arguments',
  InvalidParams = 'invalid_params'
}

/**
 * Base command error
 */
export class CommandError extends Error {
  constructor(
    public readonly type: ErrorType,
    public readonly context: Record<string, string>,
    message?: string
  ) {
    super(message || `Command error: ${type}`);
    this.name = 'CommandError';
    Error.captureStackTrace(this, this.constructor);
  }

  format(): string {
    switch (this.type) {
      case ErrorType.MissingArguments:
        return `${this.context.label} not specified!`;

      case ErrorType.InvalidParams:
        return `Invalid ${this.context.option}, ${this.context.reason}!`;

      default:
        return this.message;
    }
  }
}

/**
 * A required option was not given
 */
export class MissingArgumentsError extends CommandError {
  constructor(option: string) {
    const label = option.charAt(0).toUpperCase() + option.slice(1);
    super(ErrorType.MissingArguments, { option, label }, `Missing option: ${option}`);
  }
}

/**
 * An option was given a value it cannot take
 */
export class InvalidParamsError extends CommandError {
  constructor(option: string, reason: string) {
    super(ErrorType.InvalidParams, { option, reason }, `Invalid ${option}: ${reason}`);
  }
}
