import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { DomainModule } from '@/domain/domain.module';
import { DiscountLedgerService } from './discount-ledger.service';
import { DiscountCodeAdminService } from './discount-code-admin.service';

@Module({
  imports: [PersistenceModule, DomainModule],
  providers: [DiscountLedgerService, DiscountCodeAdminService],
  exports: [DiscountLedgerService, DiscountCodeAdminService],
})
export class DiscountModule {}
