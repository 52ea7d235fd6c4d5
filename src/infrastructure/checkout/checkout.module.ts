import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { DiscountModule } from '@/infrastructure/discount/discount.module';
import { RedsysModule } from '@/infrastructure/redsys/redsys.module';
import { AppConfigService } from '@/config/app.config';
import { CheckoutService } from './checkout.service';

@Module({
  imports: [PersistenceModule, DiscountModule, RedsysModule],
  providers: [CheckoutService, AppConfigService],
  exports: [CheckoutService],
})
export class CheckoutModule {}
