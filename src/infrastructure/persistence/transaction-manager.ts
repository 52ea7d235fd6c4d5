import type { DiscountCodeRepository } from './discount-code.repository';
import type { OrderRepository } from './order.repository';

/**
 * Repositories bound to a single open transaction
 */
export interface TransactionalRepositories {
  discountCodes: DiscountCodeRepository;
  orders: OrderRepository;
}

/**
 * Runs a unit of work atomically: every write made through the given
 * repositories commits together, or none does when `work` rejects.
 */
export abstract class TransactionManager {
  abstract run<T>(work: (repositories: TransactionalRepositories) => Promise<T>): Promise<T>;
}
