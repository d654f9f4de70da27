import { Coupon } from '../entities/coupon.entity';

export const COUPON_STORE = Symbol('COUPON_STORE');

export interface CouponStore {
  findByCode(code: string): Promise<Coupon | null>;

  /** Inserts a new coupon; false when the code is already taken. */
  create(coupon: Coupon): Promise<boolean>;
}
