import { Module } from '@nestjs/common';
import { PaymentProcessor } from './application/payment-processor.service';

@Module({
  providers: [PaymentProcessor],
  exports: [PaymentProcessor],
})
export class PaymentModule {}
