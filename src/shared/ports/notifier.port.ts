import type { DeliveryError } from '../domain/errors';
import type { Result } from '../domain/result';

/**
 * Port for delivering a message over one channel (email, SMS, ...).
 *
 * This is a PORT - the dispatcher depends on this interface, never on a
 * concrete channel. Every implementation accepts the same input and returns
 * the same result shape; only the side effect differs.
 */
export interface Notifier {
  /** Channel name, also the default registry key (e.g. 'email') */
  readonly channel: string;

  /**
   * Deliver a message.
   * Fails with DeliveryError when the side effect cannot complete.
   */
  send(message: string): Result<void, DeliveryError>;
}

/**
 * Runtime conformance check for values registered at composition time.
 * Returns the reason the value does not satisfy Notifier, or null.
 */
export function describeNotifierViolation(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) {
    return 'notifier must be an object';
  }
  if (!('channel' in value) || typeof value.channel !== 'string') {
    return 'notifier must expose a string channel';
  }
  if (value.channel.trim() === '') {
    return 'notifier channel must not be empty';
  }
  if (!('send' in value) || typeof value.send !== 'function') {
    return `notifier "${value.channel}" must implement send(message)`;
  }
  return null;
}

export const NOTIFIER_REGISTRY = Symbol('NOTIFIER_REGISTRY');
