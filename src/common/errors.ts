import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common'

/** Malformed or missing required input. */
export class ValidationError extends BadRequestException {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** No active plan, unknown template, workout, race or user. */
export class NotFoundError extends NotFoundException {
  constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/** Concurrent plan creation or a stale write against a versioned row. */
export class ConflictError extends ConflictException {
  constructor(message: string) {
    super(message)
    this.name = 'ConflictError'
  }
}

/** A formula needs a value (scalar, heart rate, age) the user does not have. */
export class ComputationError extends UnprocessableEntityException {
  constructor(message: string) {
    super(message)
    this.name = 'ComputationError'
  }
}

/** Store hiccup (timeout, dropped connection, serialization failure); retried once. */
export class TransientStoreError extends ServiceUnavailableException {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'TransientStoreError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
