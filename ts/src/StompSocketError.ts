export type StompSocketErrorCode = 'ALREADY_CONNECTED' | 'NOT_CONNECTED';

// Base class for errors thrown synchronously by StompSocket operations
export class StompSocketError extends Error {
  readonly code: StompSocketErrorCode;

  constructor(code: StompSocketErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// Thrown by connect() while the STOMP session is already established
export class AlreadyConnectedError extends StompSocketError {
  constructor() {
    super('ALREADY_CONNECTED', 'Already connected via STOMP, disconnect first');
  }
}

// Thrown by subscribe/unsubscribe/send before the STOMP session is established
export class NotConnectedError extends StompSocketError {
  readonly operation: string;

  constructor(operation: string) {
    super('NOT_CONNECTED', `Cannot ${operation}: not connected via STOMP`);
    this.operation = operation;
  }
}
