import { Inject, Injectable } from '@nestjs/common';
import { NOTIFIER_REGISTRY } from '../../../shared/ports';
import type { DeliveryError } from '../../../shared/domain/errors';
import type { Result } from '../../../shared/domain/result';
import type { NotifierRegistry } from '../../notification/application/notifier.registry';
import type { User } from '../domain/user.entity';

export function buildWelcomeMessage(user: User): string {
  return `Welcome, ${user.name}!`;
}

/**
 * Sends the welcome message through the default notifier.
 */
@Injectable()
export class WelcomeNotifier {
  constructor(
    @Inject(NOTIFIER_REGISTRY)
    private readonly registry: NotifierRegistry,
  ) {}

  sendWelcome(user: User): Result<void, DeliveryError> {
    return this.registry.getDefault().send(buildWelcomeMessage(user));
  }
}
