/**
 * Payment data interfaces
 */
export interface PaymentOrder {
  readonly amount: number;
  readonly [field: string]: unknown;
}

export interface PaymentSummary<O extends PaymentOrder = PaymentOrder> {
  total: number;
  tax: number;
  order: O;
}

/**
 * Tax strategy. New tax rules are new calculators; the processor
 * itself never changes.
 */
export type TaxCalculator<O extends PaymentOrder = PaymentOrder> = (
  order: O,
) => number;

export function percentageTax(rate: number): TaxCalculator {
  return (order) => order.amount * rate;
}

export function flatTax(value: number): TaxCalculator {
  return () => value;
}

export function isValidAmount(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}
