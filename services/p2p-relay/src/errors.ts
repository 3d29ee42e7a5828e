/**
 * Errors that carry an HTTP status. Anything else reaching the error
 * middleware is reported as a generic 500.
 */

export class RelayError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'RelayError';
    this.status = status;
  }
}

export class ValidationError extends RelayError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ValidationError';
  }

  static invalidAddress(): ValidationError {
    return new ValidationError('Invalid address format');
  }

  static invalidPublicKey(): ValidationError {
    return new ValidationError('Invalid public key');
  }
}
