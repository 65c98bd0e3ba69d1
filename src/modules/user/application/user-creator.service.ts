import { Inject, Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { USER_WRITER } from '../domain/user.repository';
import type { UserWriter } from '../domain/user.repository';
import type { CreateUserInput, User } from '../domain/user.entity';
import { CLOCK } from '../../../shared/domain/clock.port';
import type { Clock } from '../../../shared/domain/clock.port';
import { InvalidUserError } from '../../../shared/domain/errors';
import { fail, ok, type Result } from '../../../shared/domain/result';
import { CreateUserDto } from './dto/create-user.dto';

/**
 * Creates users. Validation and persistence only; notifying the new user
 * is WelcomeNotifier's job.
 */
@Injectable()
export class UserCreator {
  constructor(
    @Inject(USER_WRITER)
    private readonly writer: UserWriter,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  create(attrs: CreateUserInput): Result<User, InvalidUserError> {
    const dto = plainToInstance(CreateUserDto, attrs);
    const errors = validateSync(dto);

    if (errors.length > 0) {
      return fail(
        new InvalidUserError(
          errors.flatMap((error) => Object.values(error.constraints ?? {})),
        ),
      );
    }

    return ok(
      this.writer.insert({ name: dto.name, email: dto.email }, this.clock.now()),
    );
  }
}
