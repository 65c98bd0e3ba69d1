import { Inject, Injectable } from '@nestjs/common';
import { USER_READER } from '../domain/user.repository';
import type { UserReader } from '../domain/user.repository';
import type { User } from '../domain/user.entity';
import { UserNotFoundError } from '../../../shared/domain/errors';
import { fail, ok, type Result } from '../../../shared/domain/result';

@Injectable()
export class UserLookup {
  constructor(
    @Inject(USER_READER)
    private readonly reader: UserReader,
  ) {}

  findById(id: string): Result<User, UserNotFoundError> {
    const user = this.reader.findById(id);
    return user ? ok(user) : fail(new UserNotFoundError(id));
  }
}
