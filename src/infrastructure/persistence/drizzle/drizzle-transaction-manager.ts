import { Injectable, Inject } from '@nestjs/common';
import { TransactionManager, type TransactionalRepositories } from '../transaction-manager';
import { DiscountCodeDrizzleStore } from './discount-code-drizzle-store';
import { OrderDrizzleStore } from './order-drizzle-store';
import { DATABASE_CONNECTION, type DrizzleExecutor } from '@/infrastructure/database/database.module';

/**
 * Opens a Postgres transaction and hands the work stores bound to it.
 * A rejection inside `work` rolls the transaction back.
 */
@Injectable()
export class DrizzleTransactionManager extends TransactionManager {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: DrizzleExecutor,
  ) {
    super();
  }

  run<T>(work: (repositories: TransactionalRepositories) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) =>
      work({
        discountCodes: new DiscountCodeDrizzleStore(tx),
        orders: new OrderDrizzleStore(tx),
      }),
    );
  }
}
