import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from '../entities';
import { ORDER_STORE } from './order.store';
import { COURIER_STORE } from './courier.store';
import { COUPON_STORE } from './coupon.store';
import { TypeOrmOrderStore } from './typeorm-order.store';
import { TypeOrmCourierStore } from './typeorm-courier.store';
import { TypeOrmCouponStore } from './typeorm-coupon.store';

@Module({
  imports: [TypeOrmModule.forFeature(ENTITIES)],
  providers: [
    { provide: ORDER_STORE, useClass: TypeOrmOrderStore },
    { provide: COURIER_STORE, useClass: TypeOrmCourierStore },
    { provide: COUPON_STORE, useClass: TypeOrmCouponStore },
  ],
  exports: [ORDER_STORE, COURIER_STORE, COUPON_STORE],
})
export class PersistenceModule {}
