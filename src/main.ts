import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/environment';
import { StderrLogger } from './shared/infrastructure/logging/stderr.logger';
import { OrderNotifier } from './modules/notification/application/order-notifier.service';
import { SmsNotifier } from './modules/notification/infrastructure/sms.notifier';

async function bootstrap() {
  // Startup lines are held until LOG_LEVEL (env or .env) is known
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const stderrLogger = new StderrLogger();
  stderrLogger.setLogLevels(
    resolveLogLevels(app.get(ConfigService).get<string>('LOG_LEVEL')),
  );
  app.useLogger(stderrLogger);

  const logger = new Logger('Bootstrap');
  const orderNotifier = app.get(OrderNotifier);

  // Default notifier
  const viaDefault = orderNotifier.notify({ id: 101 });
  // Swapped at call time
  const viaSms = orderNotifier.notify({ id: 101 }, app.get(SmsNotifier));

  for (const result of [viaDefault, viaSms]) {
    if (!result.success) {
      logger.error(`${result.error.code}: ${result.error.message}`);
      process.exitCode = 1;
    }
  }

  await app.close();
}

bootstrap().catch((error: unknown) => {
  new StderrLogger('Bootstrap').error(
    error instanceof Error ? error.message : String(error),
  );
  process.exit(1);
});
