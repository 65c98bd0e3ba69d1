import type { CreateUserInput, User } from './user.entity';

/**
 * User repository ports, split by capability.
 *
 * Consumers depend on the one capability they use: UserCreator only
 * writes, UserLookup only reads.
 */
export interface UserWriter {
  /**
   * Persist a new user
   * @returns the stored user with its generated id
   */
  insert(input: CreateUserInput, createdAt: Date): User;
}

export interface UserReader {
  /**
   * @returns null if not found
   */
  findById(id: string): User | null;
}

export const USER_WRITER = Symbol('USER_WRITER');
export const USER_READER = Symbol('USER_READER');
