import { Logger } from '@nestjs/common';
import type { Notifier } from '../../../shared/ports/notifier.port';
import { describeNotifierViolation } from '../../../shared/ports/notifier.port';
import {
  DuplicateNotifierError,
  InvalidNotifierError,
  NotifierRegistrySealedError,
  UnknownNotifierError,
} from '../../../shared/domain/errors';
import { fail, ok, type Result } from '../../../shared/domain/result';

/**
 * Named set of interchangeable notifiers plus the default used when a
 * caller does not pick one.
 *
 * Populated once during module initialization, then sealed. After `seal()`
 * the registry is read-only for the rest of the process.
 */
export class NotifierRegistry {
  private readonly logger = new Logger(NotifierRegistry.name);
  private readonly notifiers = new Map<string, Notifier>();
  private sealed = false;

  constructor(readonly defaultName: string) {}

  /**
   * Register a notifier under `name` (defaults to its channel).
   * Re-registering the same instance under the same name is a no-op.
   *
   * @throws InvalidNotifierError if the value does not satisfy Notifier
   * @throws DuplicateNotifierError if another instance owns the name
   * @throws NotifierRegistrySealedError once the registry is sealed
   */
  register(notifier: Notifier, name?: string): this {
    const violation = describeNotifierViolation(notifier);
    if (violation) {
      throw new InvalidNotifierError(violation);
    }

    const key = name ?? notifier.channel;
    const existing = this.notifiers.get(key);
    if (existing === notifier) {
      this.logger.debug(`Notifier "${key}" already registered`);
      return this;
    }

    if (this.sealed) {
      throw new NotifierRegistrySealedError(key);
    }
    if (existing) {
      throw new DuplicateNotifierError(key);
    }

    this.notifiers.set(key, notifier);
    this.logger.debug(`Notifier registered: ${key}`);
    return this;
  }

  /**
   * Freeze the registry.
   * @throws UnknownNotifierError if the default notifier was never registered
   */
  seal(): this {
    if (!this.notifiers.has(this.defaultName)) {
      throw new UnknownNotifierError(this.defaultName);
    }
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  getDefault(): Notifier {
    const notifier = this.notifiers.get(this.defaultName);
    if (!notifier) {
      throw new UnknownNotifierError(this.defaultName);
    }
    return notifier;
  }

  resolve(name: string): Result<Notifier, UnknownNotifierError> {
    const notifier = this.notifiers.get(name);
    return notifier ? ok(notifier) : fail(new UnknownNotifierError(name));
  }

  /**
   * Identity check: true only for an instance that was registered.
   */
  isRegistered(notifier: Notifier): boolean {
    for (const registered of this.notifiers.values()) {
      if (registered === notifier) {
        return true;
      }
    }
    return false;
  }

  names(): string[] {
    return Array.from(this.notifiers.keys());
  }
}
