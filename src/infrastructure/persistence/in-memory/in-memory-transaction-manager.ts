import { Injectable } from '@nestjs/common';
import { TransactionManager, type TransactionalRepositories } from '../transaction-manager';
import { DiscountCodeInMemoryStore } from './discount-code-in-memory-store';
import { OrderInMemoryStore } from './order-in-memory-store';

/**
 * Serializes units of work and restores the stores' previous state when one rejects.
 */
@Injectable()
export class InMemoryTransactionManager extends TransactionManager {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly discountCodes: DiscountCodeInMemoryStore,
    private readonly orders: OrderInMemoryStore,
  ) {
    super();
  }

  run<T>(work: (repositories: TransactionalRepositories) => Promise<T>): Promise<T> {
    const result = this.tail.then(() => this.runIsolated(work));
    // The caller observes failures through `result`; the chain only orders execution
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async runIsolated<T>(work: (repositories: TransactionalRepositories) => Promise<T>): Promise<T> {
    const discountCodesSnapshot = this.discountCodes.rows.snapshot();
    const ordersSnapshot = this.orders.rows.snapshot();

    try {
      return await work({ discountCodes: this.discountCodes, orders: this.orders });
    } catch (error) {
      this.discountCodes.rows.restore(discountCodesSnapshot);
      this.orders.rows.restore(ordersSnapshot);
      throw error;
    }
  }
}
