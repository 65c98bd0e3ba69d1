import { Module } from '@nestjs/common';
import { NotificationModule } from '../notification/notification.module';
import { UserCreator } from './application/user-creator.service';
import { UserLookup } from './application/user-lookup.service';
import { WelcomeNotifier } from './application/welcome-notifier.service';
import { RegisterUserUseCase } from './application/use-cases';

// Repository
import { USER_READER, USER_WRITER } from './domain/user.repository';
import { InMemoryUserRepository } from './infrastructure/in-memory-user.repository';

// Clock
import { CLOCK } from '../../shared/domain/clock.port';
import { SystemClock } from '../../shared/infrastructure/system-clock';

@Module({
  imports: [NotificationModule],
  providers: [
    // Clock (infrastructure adapter)
    {
      provide: CLOCK,
      useClass: SystemClock,
    },

    // One store, exposed through both segregated ports
    InMemoryUserRepository,
    { provide: USER_WRITER, useExisting: InMemoryUserRepository },
    { provide: USER_READER, useExisting: InMemoryUserRepository },

    UserCreator,
    UserLookup,
    WelcomeNotifier,

    // Use Cases
    RegisterUserUseCase,
  ],
  exports: [RegisterUserUseCase, UserLookup],
})
export class UserModule {}
