/**
 * Base class for domain errors.
 * Domain errors represent business rule violations.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ NOTIFICATION ERRORS ============

export class DeliveryError extends DomainError {
  readonly code = 'DELIVERY_FAILED';

  constructor(
    public readonly reason: string,
    public readonly channel?: string,
  ) {
    super(
      channel
        ? `Delivery via ${channel} failed: ${reason}`
        : `Delivery failed: ${reason}`,
    );
  }
}

export class UnknownNotifierError extends DomainError {
  readonly code = 'UNKNOWN_NOTIFIER';

  constructor(public readonly notifier: string) {
    super(`Notifier "${notifier}" is not registered`);
  }
}

export class DuplicateNotifierError extends DomainError {
  readonly code = 'DUPLICATE_NOTIFIER';

  constructor(public readonly notifier: string) {
    super(`A different notifier is already registered as "${notifier}"`);
  }
}

export class NotifierRegistrySealedError extends DomainError {
  readonly code = 'REGISTRY_SEALED';

  constructor(public readonly notifier: string) {
    super(`Cannot register "${notifier}": the notifier registry is sealed`);
  }
}

export class InvalidNotifierError extends DomainError {
  readonly code = 'INVALID_NOTIFIER';

  constructor(message: string) {
    super(message);
  }
}

export class InvalidOrderError extends DomainError {
  readonly code = 'INVALID_ORDER';

  constructor() {
    super('Order must carry an identifier');
  }
}

// ============ PAYMENT ERRORS ============

export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';

  constructor(
    public readonly field: 'amount' | 'tax',
    public readonly value: number,
  ) {
    super(`${field} must be a finite, non-negative number (got ${value})`);
  }
}

// ============ USER ERRORS ============

export class InvalidUserError extends DomainError {
  readonly code = 'INVALID_USER';

  constructor(public readonly violations: string[]) {
    super(`Invalid user: ${violations.join('; ')}`);
  }
}

export class UserNotFoundError extends DomainError {
  readonly code = 'USER_NOT_FOUND';

  constructor(public readonly userId: string) {
    super(`User with id ${userId} not found`);
  }
}

// ============ VEHICLE ERRORS ============

export class NoEngineError extends DomainError {
  readonly code = 'NO_ENGINE';

  constructor(public readonly model: string) {
    super(`${model} has no engine`);
  }
}
