import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Coupon } from '../entities/coupon.entity';
import { CouponStore } from './coupon.store';

@Injectable()
export class TypeOrmCouponStore implements CouponStore {
  constructor(@InjectRepository(Coupon) private readonly couponRepo: Repository<Coupon>) {}

  findByCode(code: string): Promise<Coupon | null> {
    return this.couponRepo.findOne({ where: { code: code.toUpperCase() } });
  }

  async create(coupon: Coupon): Promise<boolean> {
    const result = await this.couponRepo
      .createQueryBuilder()
      .insert()
      .into(Coupon)
      .values({ ...coupon, code: coupon.code.toUpperCase() })
      .orIgnore()
      .returning('code')
      .execute();
    // ON CONFLICT DO NOTHING returns no row for a taken code.
    return Array.isArray(result.raw) && result.raw.length > 0;
  }
}
