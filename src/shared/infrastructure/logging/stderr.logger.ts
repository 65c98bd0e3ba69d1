import { ConsoleLogger, Injectable, type LogLevel } from '@nestjs/common';

/**
 * Nest console logger that writes every level to stderr.
 * stdout carries notification output only.
 */
@Injectable()
export class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
