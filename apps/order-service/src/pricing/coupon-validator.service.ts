import { Injectable } from '@nestjs/common';
import {
  CouponRejectionReason,
  CouponTerms,
  CouponValidationResult,
  DiscountType,
  roundMoney,
} from '@marketplace/shared';

const REJECTION_MESSAGES: Record<CouponRejectionReason, (coupon: CouponTerms | null) => string> = {
  [CouponRejectionReason.NOT_FOUND]: () => 'Coupon code is not valid',
  [CouponRejectionReason.NOT_YET_VALID]: () => 'Coupon is not valid yet',
  [CouponRejectionReason.EXPIRED]: () => 'Coupon has expired',
  [CouponRejectionReason.EXHAUSTED]: () => 'Coupon has reached its redemption limit',
  [CouponRejectionReason.BELOW_MINIMUM]: (coupon) =>
    `A minimum order of ${(coupon?.minimumOrderAmount ?? 0).toFixed(2)} is required for this coupon`,
  [CouponRejectionReason.NOT_APPLICABLE]: () => 'Coupon does not apply to this restaurant',
};

export function normalizeCouponCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Decides whether a coupon applies to an order and how much it takes off. Pure: the
 * redemption count is only read here and is incremented by the order store when the
 * order is persisted.
 */
@Injectable()
export class CouponValidatorService {
  validate(
    code: string,
    coupon: CouponTerms | null,
    subtotal: number,
    now: Date,
    restaurantId?: string,
  ): CouponValidationResult {
    const normalized = normalizeCouponCode(code);

    if (!coupon || !coupon.active) {
      return this.reject(normalized, CouponRejectionReason.NOT_FOUND, null);
    }
    if (coupon.validFrom && now.getTime() < coupon.validFrom.getTime()) {
      return this.reject(normalized, CouponRejectionReason.NOT_YET_VALID, coupon);
    }
    if (now.getTime() >= coupon.expiresAt.getTime()) {
      return this.reject(normalized, CouponRejectionReason.EXPIRED, coupon);
    }
    if (coupon.redemptionCount >= coupon.maxRedemptions) {
      return this.reject(normalized, CouponRejectionReason.EXHAUSTED, coupon);
    }
    if (subtotal < coupon.minimumOrderAmount) {
      return this.reject(normalized, CouponRejectionReason.BELOW_MINIMUM, coupon);
    }
    if (restaurantId && coupon.restaurantIds?.length && !coupon.restaurantIds.includes(restaurantId)) {
      return this.reject(normalized, CouponRejectionReason.NOT_APPLICABLE, coupon);
    }

    return { valid: true, code: normalized, discount: this.computeDiscount(coupon, subtotal) };
  }

  computeDiscount(coupon: CouponTerms, subtotal: number): number {
    let discount =
      coupon.discountType === DiscountType.FLAT
        ? Math.min(coupon.discountValue, subtotal)
        : subtotal * coupon.discountValue;

    if (coupon.maxDiscountAmount !== null && coupon.maxDiscountAmount !== undefined) {
      discount = Math.min(discount, coupon.maxDiscountAmount);
    }
    return roundMoney(Math.max(0, discount));
  }

  private reject(code: string, reason: CouponRejectionReason, coupon: CouponTerms | null): CouponValidationResult {
    return { valid: false, code, reason, message: REJECTION_MESSAGES[reason](coupon) };
  }
}
