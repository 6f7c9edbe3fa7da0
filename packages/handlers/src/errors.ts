/**
 * @fileoverview Errors handlers throw. Anything thrown from a handler call is
 * treated as a transient failure of that coin or deposit, except
 * AccountNotFoundError which marks the destination as refused.
 */

export class HandlerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerError';
  }
}

/**
 * The daemon or API behind a handler is unreachable.
 */
export class DeadApiError extends HandlerError {
  constructor(message: string) {
    super(message);
    this.name = 'DeadApiError';
  }
}

/**
 * The receiving address or account does not exist.
 */
export class AccountNotFoundError extends HandlerError {
  constructor(message: string) {
    super(message);
    this.name = 'AccountNotFoundError';
  }
}

/**
 * The hot wallet cannot cover the send.
 */
export class NotEnoughBalanceError extends HandlerError {
  constructor(message: string) {
    super(message);
    this.name = 'NotEnoughBalanceError';
  }
}

/**
 * A request the caller withdrew right before it would have been sent.
 */
export class RequestDroppedError extends HandlerError {
  constructor(message: string) {
    super(message);
    this.name = 'RequestDroppedError';
  }
}
