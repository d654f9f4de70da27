import { DiscountType } from '../enums/discount-type.enum';

export interface CouponTerms {
  code: string;
  discountType: DiscountType;
  /** Fraction in [0, 1] for PERCENTAGE, currency amount for FLAT. */
  discountValue: number;
  minimumOrderAmount: number;
  maxDiscountAmount?: number | null;
  validFrom?: Date | null;
  expiresAt: Date;
  maxRedemptions: number;
  redemptionCount: number;
  active: boolean;
  restaurantIds?: string[] | null;
}

export enum CouponRejectionReason {
  NOT_FOUND = 'NOT_FOUND',
  NOT_YET_VALID = 'NOT_YET_VALID',
  EXPIRED = 'EXPIRED',
  EXHAUSTED = 'EXHAUSTED',
  BELOW_MINIMUM = 'BELOW_MINIMUM',
  NOT_APPLICABLE = 'NOT_APPLICABLE',
}

export type CouponValidationResult =
  | { valid: true; code: string; discount: number }
  | { valid: false; code: string; reason: CouponRejectionReason; message: string };
