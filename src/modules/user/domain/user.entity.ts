/**
 * User data interface (for persistence/transfer)
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly createdAt: Date;
}

// Input types for service layer
export interface CreateUserInput {
  name: string;
  email: string;
}
