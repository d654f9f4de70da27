import { Inject, Injectable, Logger } from '@nestjs/common';
import { CouponValidationResult, DiscountType, roundMoney } from '@marketplace/shared';
import { Coupon } from '../entities/coupon.entity';
import { COUPON_STORE, CouponStore } from '../persistence/coupon.store';
import { CouponValidatorService, normalizeCouponCode } from '../pricing/coupon-validator.service';
import { EngineErrors } from '../common/errors/engine.exception';

export interface CreateCouponInput {
  code: string;
  description?: string;
  discountType: DiscountType;
  discountValue: number;
  minimumOrderAmount?: number;
  maxDiscountAmount?: number | null;
  validFrom?: Date | null;
  expiresAt: Date;
  maxRedemptions: number;
  restaurantIds?: string[] | null;
}

export interface CouponPreviewInput {
  code: string;
  subtotal: number;
  restaurantId?: string;
}

export type CouponPreview = CouponValidationResult & { subtotal: number; total: number };

@Injectable()
export class CouponService {
  private readonly logger = new Logger(CouponService.name);

  constructor(
    @Inject(COUPON_STORE) private readonly store: CouponStore,
    private readonly validator: CouponValidatorService,
  ) {}

  async createCoupon(input: CreateCouponInput, now: Date = new Date()): Promise<Coupon> {
    const code = normalizeCouponCode(input.code);
    this.assertTerms(code, input, now);

    const coupon = new Coupon();
    coupon.code = code;
    coupon.description = input.description ?? '';
    coupon.discountType = input.discountType;
    coupon.discountValue = input.discountValue;
    coupon.minimumOrderAmount = input.minimumOrderAmount ?? 0;
    coupon.maxDiscountAmount = input.maxDiscountAmount ?? null;
    coupon.validFrom = input.validFrom ?? null;
    coupon.expiresAt = input.expiresAt;
    coupon.maxRedemptions = input.maxRedemptions;
    coupon.redemptionCount = 0;
    coupon.active = true;
    coupon.restaurantIds = input.restaurantIds?.length ? [...new Set(input.restaurantIds)] : null;
    coupon.createdAt = now;
    coupon.updatedAt = now;

    if (!(await this.store.create(coupon))) {
      throw EngineErrors.couponExists(code);
    }
    this.logger.log(`Created coupon ${code}`, {
      discountType: coupon.discountType,
      discountValue: coupon.discountValue,
      maxRedemptions: coupon.maxRedemptions,
    });
    return coupon;
  }

  /**
   * Runs the same checks an order would against a given subtotal. Nothing is redeemed,
   * so a valid preview does not hold a redemption for the caller.
   */
  async previewCoupon(input: CouponPreviewInput, now: Date = new Date()): Promise<CouponPreview> {
    const code = normalizeCouponCode(input.code);
    const subtotal = roundMoney(input.subtotal);
    const coupon = await this.store.findByCode(code);
    const verdict = this.validator.validate(code, coupon, subtotal, now, input.restaurantId);
    const discount = verdict.valid ? verdict.discount : 0;
    return { ...verdict, subtotal, total: roundMoney(subtotal - discount) };
  }

  private assertTerms(code: string, input: CreateCouponInput, now: Date): void {
    if (!/^[A-Z0-9_-]{3,64}$/.test(code)) {
      throw EngineErrors.invalidCoupon('Coupon codes are 3 to 64 letters, digits, dashes or underscores', code);
    }
    if (input.discountType === DiscountType.PERCENTAGE && !(input.discountValue > 0 && input.discountValue <= 1)) {
      throw EngineErrors.invalidCoupon('A percentage discount is a fraction above 0 and at most 1', code);
    }
    if (input.discountType === DiscountType.FLAT && !(input.discountValue > 0)) {
      throw EngineErrors.invalidCoupon('A flat discount must be a positive amount', code);
    }
    if ((input.minimumOrderAmount ?? 0) < 0) {
      throw EngineErrors.invalidCoupon('The minimum order amount cannot be negative', code);
    }
    if (input.maxDiscountAmount !== null && input.maxDiscountAmount !== undefined && input.maxDiscountAmount <= 0) {
      throw EngineErrors.invalidCoupon('The discount cap must be a positive amount', code);
    }
    if (!Number.isInteger(input.maxRedemptions) || input.maxRedemptions < 1) {
      throw EngineErrors.invalidCoupon('A coupon must allow at least one redemption', code);
    }
    if (input.expiresAt.getTime() <= now.getTime()) {
      throw EngineErrors.invalidCoupon('The expiry must be in the future', code);
    }
    if (input.validFrom && input.validFrom.getTime() >= input.expiresAt.getTime()) {
      throw EngineErrors.invalidCoupon('The coupon must start before it expires', code);
    }
  }
}
