import { Injectable } from '@nestjs/common';
import { InvalidAmountError } from '../../../shared/domain/errors';
import { fail, ok, type Result } from '../../../shared/domain/result';
import {
  isValidAmount,
  type PaymentOrder,
  type PaymentSummary,
  type TaxCalculator,
} from '../domain/payment';

@Injectable()
export class PaymentProcessor {
  /**
   * Total an order with the given tax strategy.
   * The calculator is only called for a valid amount.
   */
  process<O extends PaymentOrder>(
    order: O,
    taxCalculator: TaxCalculator<O>,
  ): Result<PaymentSummary<O>, InvalidAmountError> {
    if (!isValidAmount(order.amount)) {
      return fail(new InvalidAmountError('amount', order.amount));
    }

    const tax = taxCalculator(order);
    if (!isValidAmount(tax)) {
      return fail(new InvalidAmountError('tax', tax));
    }

    return ok({ total: order.amount + tax, tax, order });
  }
}
