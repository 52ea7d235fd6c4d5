import { Module } from '@nestjs/common';
import { DatabaseModule } from '@/infrastructure/database/database.module';
import { DiscountCodeRepository } from '@/infrastructure/persistence/discount-code.repository';
import { DiscountCodeDrizzleStore } from '@/infrastructure/persistence/drizzle/discount-code-drizzle-store';
import { OrderRepository } from '@/infrastructure/persistence/order.repository';
import { OrderDrizzleStore } from '@/infrastructure/persistence/drizzle/order-drizzle-store';
import { PaymentNotificationRepository } from '@/infrastructure/persistence/payment-notification.repository';
import { PaymentNotificationDrizzleStore } from '@/infrastructure/persistence/drizzle/payment-notification-drizzle-store';
import { TransactionManager } from '@/infrastructure/persistence/transaction-manager';
import { DrizzleTransactionManager } from '@/infrastructure/persistence/drizzle/drizzle-transaction-manager';

@Module({
  imports: [DatabaseModule],
  providers: [
    {
      provide: DiscountCodeRepository,
      useClass: DiscountCodeDrizzleStore,
    },
    {
      provide: OrderRepository,
      useClass: OrderDrizzleStore,
    },
    {
      provide: PaymentNotificationRepository,
      useClass: PaymentNotificationDrizzleStore,
    },
    {
      provide: TransactionManager,
      useClass: DrizzleTransactionManager,
    },
  ],
  exports: [
    DiscountCodeRepository,
    OrderRepository,
    PaymentNotificationRepository,
    TransactionManager,
  ],
})
export class PersistenceModule {}
