import type { LogLevel } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  validateSync,
} from 'class-validator';
import { Trim } from '../shared/decorators/trim.decorator';

export const DEFAULT_NOTIFIER_FALLBACK = 'email';

const LOG_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error'];

/**
 * Environment variables understood by the application. All optional.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @Trim()
  @IsString()
  @IsNotEmpty()
  DEFAULT_NOTIFIER?: string;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: LogLevel;
}

/**
 * ConfigModule `validate` hook.
 * @throws Error listing every failed constraint
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated);

  if (errors.length > 0) {
    const details = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment: ${details.join('; ')}`);
  }

  // Unset optional fields must not reach process.env as "undefined"
  return Object.fromEntries(
    Object.entries(validated).filter(([, value]) => value !== undefined),
  );
}

/**
 * Logger levels enabled for a LOG_LEVEL value: that severity and above.
 * Unknown or missing values fall back to 'log'.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(index === -1 ? LOG_LEVELS.indexOf('log') : index);
}
