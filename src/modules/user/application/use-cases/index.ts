export { RegisterUserUseCase } from './register-user.use-case';
export type { RegisterUserResult } from './register-user.use-case';
