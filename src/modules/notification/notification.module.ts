import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NOTIFIER_REGISTRY, OUTPUT_SINK } from '../../shared/ports';
import { ConsoleOutputSink } from '../../shared/infrastructure/output/console-output.sink';
import { DEFAULT_NOTIFIER_FALLBACK } from '../../config/environment';
import { NotifierRegistry } from './application/notifier.registry';
import { OrderNotifier } from './application/order-notifier.service';
import { EmailNotifier } from './infrastructure/email.notifier';
import { SmsNotifier } from './infrastructure/sms.notifier';

@Module({
  providers: [
    // Output sink (infrastructure adapter)
    {
      provide: OUTPUT_SINK,
      useClass: ConsoleOutputSink,
    },

    // Notifier implementations
    EmailNotifier,
    SmsNotifier,

    // Registry: built and sealed once at startup
    {
      provide: NOTIFIER_REGISTRY,
      useFactory: (
        config: ConfigService,
        email: EmailNotifier,
        sms: SmsNotifier,
      ): NotifierRegistry =>
        new NotifierRegistry(
          config.get<string>('DEFAULT_NOTIFIER', DEFAULT_NOTIFIER_FALLBACK),
        )
          .register(email)
          .register(sms)
          .seal(),
      inject: [ConfigService, EmailNotifier, SmsNotifier],
    },

    OrderNotifier,
  ],
  exports: [NOTIFIER_REGISTRY, OrderNotifier, EmailNotifier, SmsNotifier],
})
export class NotificationModule {}
