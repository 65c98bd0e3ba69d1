import { Injectable } from '@nestjs/common';
import type { UserReader, UserWriter } from '../domain/user.repository';
import type { CreateUserInput, User } from '../domain/user.entity';

/**
 * Process-local user store. Ids are sequential: user-1, user-2, ...
 */
@Injectable()
export class InMemoryUserRepository implements UserWriter, UserReader {
  private readonly users = new Map<string, User>();
  private sequence = 0;

  insert(input: CreateUserInput, createdAt: Date): User {
    this.sequence += 1;
    const user: User = {
      id: `user-${this.sequence}`,
      name: input.name,
      email: input.email,
      createdAt,
    };
    this.users.set(user.id, user);
    return user;
  }

  findById(id: string): User | null {
    return this.users.get(id) ?? null;
  }
}
