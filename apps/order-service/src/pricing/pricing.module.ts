import { Module } from '@nestjs/common';
import { CouponValidatorService } from './coupon-validator.service';
import { PricingService } from './pricing.service';

@Module({
  providers: [CouponValidatorService, PricingService],
  exports: [CouponValidatorService, PricingService],
})
export class PricingModule {}
