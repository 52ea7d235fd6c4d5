import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { RedsysModule } from '@/infrastructure/redsys/redsys.module';
import { PaymentReconcilerService } from './payment-reconciler.service';

@Module({
  imports: [PersistenceModule, RedsysModule],
  providers: [PaymentReconcilerService],
  exports: [PaymentReconcilerService],
})
export class PaymentModule {}
