import { Module } from '@nestjs/common';
import { DiscountCalculatorService } from './services/discount-calculator.service';

/**
 * Pure business rules, free of persistence and transport
 */
@Module({
  providers: [DiscountCalculatorService],
  exports: [DiscountCalculatorService],
})
export class DomainModule {}
