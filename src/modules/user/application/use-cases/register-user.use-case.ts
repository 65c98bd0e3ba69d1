import { Injectable, Logger } from '@nestjs/common';
import type { DeliveryError, InvalidUserError } from '../../../../shared/domain/errors';
import type { Result } from '../../../../shared/domain/result';
import type { CreateUserInput, User } from '../../domain/user.entity';
import { UserCreator } from '../user-creator.service';
import { WelcomeNotifier } from '../welcome-notifier.service';

/**
 * Result type using discriminated union for explicit error handling.
 * A failed welcome does not undo the registration; it is reported alongside.
 */
export type RegisterUserResult =
  | { success: true; user: User; welcome: Result<void, DeliveryError> }
  | { success: false; error: InvalidUserError };

/**
 * RegisterUser Use Case
 *
 * ORCHESTRATES user registration from single-purpose collaborators:
 * 1. Create the user (UserCreator)
 * 2. Send the welcome message (WelcomeNotifier)
 * 3. Log the outcome
 */
@Injectable()
export class RegisterUserUseCase {
  private readonly logger = new Logger(RegisterUserUseCase.name);

  constructor(
    private readonly creator: UserCreator,
    private readonly welcomeNotifier: WelcomeNotifier,
  ) {}

  execute(input: CreateUserInput): RegisterUserResult {
    const created = this.creator.create(input);
    if (!created.success) {
      return { success: false, error: created.error };
    }

    const user = created.value;
    const welcome = this.welcomeNotifier.sendWelcome(user);
    if (!welcome.success) {
      this.logger.warn(
        `Welcome message for ${user.id} failed: ${welcome.error.message}`,
      );
    }

    this.logger.log(`User created: ${user.id}`);

    return { success: true, user, welcome };
  }
}
