/**
 * Order data as seen by the notification flow.
 * Only the identifier is read; any other field is carried along untouched.
 */
export interface Order {
  readonly id: OrderId;
  readonly [field: string]: unknown;
}

export type OrderId = string | number;

export function hasOrderId(order: Order): boolean {
  return order.id !== null && order.id !== undefined;
}

/**
 * Confirmation text for an order. Does not depend on the delivery channel.
 */
export function buildConfirmationMessage(order: Order): string {
  return `Order #${order.id} confirmed!`;
}
