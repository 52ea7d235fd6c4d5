export type OrderStatus = 'pending' | 'paid' | 'failed' | 'canceled';

export type TerminalOrderStatus = Exclude<OrderStatus, 'pending'>;

/**
 * Outcome reported by the payment gateway, after mapping its response code
 */
export type PaymentOutcome = 'success' | 'cancel' | 'failure';

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>(['paid', 'failed', 'canceled']);

export const isTerminalStatus = (status: OrderStatus): status is TerminalOrderStatus => {
  return TERMINAL_STATUSES.has(status);
};

export const STATUS_BY_OUTCOME: Record<PaymentOutcome, TerminalOrderStatus> = {
  success: 'paid',
  cancel: 'canceled',
  failure: 'failed',
};
