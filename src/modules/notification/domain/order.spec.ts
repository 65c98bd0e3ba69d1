import { describe, it, expect } from 'vitest';
import { buildConfirmationMessage, hasOrderId, type Order } from './order';

describe('buildConfirmationMessage', () => {
  it('should build the confirmation text from the order id', () => {
    expect(buildConfirmationMessage({ id: 101 })).toBe(
      'Order #101 confirmed!',
    );
  });

  it('should accept string identifiers', () => {
    expect(buildConfirmationMessage({ id: 'A-7' })).toBe(
      'Order #A-7 confirmed!',
    );
  });

  it('should ignore every other field', () => {
    const order: Order = { id: 5, customer: 'Ana', amount: 100 };

    expect(buildConfirmationMessage(order)).toBe('Order #5 confirmed!');
  });
});

describe('hasOrderId', () => {
  it('should accept zero and empty-string identifiers', () => {
    expect(hasOrderId({ id: 0 })).toBe(true);
    expect(hasOrderId({ id: '' })).toBe(true);
  });

  it('should reject a missing identifier', () => {
    const order = JSON.parse('{"id": null}') as Order;

    expect(hasOrderId(order)).toBe(false);
  });
});
