import { Inject, Injectable, Logger } from '@nestjs/common';
import { NOTIFIER_REGISTRY } from '../../../shared/ports';
import type { Notifier } from '../../../shared/ports';
import {
  InvalidOrderError,
  UnknownNotifierError,
  type DeliveryError,
} from '../../../shared/domain/errors';
import { fail, type Result } from '../../../shared/domain/result';
import { buildConfirmationMessage, hasOrderId, type Order } from '../domain/order';
import type { NotifierRegistry } from './notifier.registry';

export type NotifyError =
  | InvalidOrderError
  | UnknownNotifierError
  | DeliveryError;

export type NotifyResult = Result<void, NotifyError>;

/**
 * OrderNotifier
 *
 * Sends the order confirmation through a notifier. Depends only on the
 * Notifier port and the registry; the channel is either supplied by the
 * caller or the registry's default.
 *
 * An unregistered notifier is reported as UnknownNotifierError rather than
 * silently replaced by the default.
 */
@Injectable()
export class OrderNotifier {
  private readonly logger = new Logger(OrderNotifier.name);

  constructor(
    @Inject(NOTIFIER_REGISTRY)
    private readonly registry: NotifierRegistry,
  ) {}

  notify(order: Order, notifier?: Notifier): NotifyResult {
    if (!hasOrderId(order)) {
      return fail(new InvalidOrderError());
    }

    const target = notifier ?? this.registry.getDefault();
    if (!this.registry.isRegistered(target)) {
      this.logger.warn(
        `Rejected order #${order.id}: notifier "${target.channel}" is not registered`,
      );
      return fail(new UnknownNotifierError(target.channel));
    }

    this.logger.debug(`Routing order #${order.id} via ${target.channel}`);
    const result = target.send(buildConfirmationMessage(order));

    if (!result.success) {
      this.logger.warn(
        `Order #${order.id} confirmation failed: ${result.error.message}`,
      );
    }

    return result;
  }

  /**
   * Same as notify(), picking the notifier by its registered name.
   */
  notifyVia(order: Order, name: string): NotifyResult {
    const resolved = this.registry.resolve(name);
    if (!resolved.success) {
      return resolved;
    }
    return this.notify(order, resolved.value);
  }
}
