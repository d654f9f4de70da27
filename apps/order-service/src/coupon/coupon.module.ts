import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { PricingModule } from '../pricing/pricing.module';
import { CouponService } from './coupon.service';
import { CouponController } from './coupon.controller';

@Module({
  imports: [PersistenceModule, CollaboratorsModule, PricingModule],
  controllers: [CouponController],
  providers: [CouponService],
})
export class CouponModule {}
