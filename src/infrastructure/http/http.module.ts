import { Module } from '@nestjs/common';
import { AppConfigService } from '@/config/app.config';
import { DiscountModule } from '@/infrastructure/discount/discount.module';
import { CheckoutModule } from '@/infrastructure/checkout/checkout.module';
import { PaymentModule } from '@/infrastructure/payment/payment.module';
import { DiscountCodeController } from './discount-code.controller';
import { OrderController } from './order.controller';
import { RedsysCallbackController } from './redsys-callback.controller';
import { AdminTokenGuard } from './guards/admin-token.guard';

@Module({
  imports: [DiscountModule, CheckoutModule, PaymentModule],
  controllers: [DiscountCodeController, OrderController, RedsysCallbackController],
  providers: [AppConfigService, AdminTokenGuard],
})
export class HttpModule {}
