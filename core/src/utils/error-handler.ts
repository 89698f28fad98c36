import { ErrorCode } from '../types';

export class RoverError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'RoverError';
  }
}

// Raised by execute() before the rover has landed
export class RoverDidNotLandError extends RoverError {
  constructor() {
    super(ErrorCode.RoverDidNotLand, 'Rover did not land');
    this.name = 'RoverDidNotLandError';
  }
}

export class ConfigurationError extends RoverError {
  constructor(public readonly errors: string[]) {
    super(ErrorCode.InvalidConfig, `Invalid rover configuration: ${errors.join('; ')}`, errors);
    this.name = 'ConfigurationError';
  }
}

export class ErrorHandler {
  static isRoverError(error: unknown): error is RoverError {
    return error instanceof RoverError;
  }

  static isLandingError(error: unknown): error is RoverDidNotLandError {
    return error instanceof RoverError && error.code === ErrorCode.RoverDidNotLand;
  }

  static formatError(error: Error): string {
    if (error instanceof RoverError) {
      return `[${error.code}] ${error.message}`;
    }
    return error.message;
  }
}
