import {
  BadRequestException,
  ConflictException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Precondition violations raised by the ledger. None of them is retryable:
 * the caller has to change the request.
 */

/** Non-positive or malformed amounts, overpayment. */
export class ValidationError extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

/** Second active loan for a member, duplicate member number. */
export class ConflictError extends ConflictException {
  constructor(message: string) {
    super(message);
  }
}

/** Operation on a loan that is no longer active. */
export class InvalidStateError extends UnprocessableEntityException {
  constructor(message: string) {
    super(message);
  }
}
