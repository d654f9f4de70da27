import { Injectable } from '@nestjs/common';
import { PricingBreakdown, roundMoney } from '@marketplace/shared';
import { EngineErrors } from '../common/errors/engine.exception';

export interface PriceableItem {
  dishId: string;
  quantity: number;
  unitPrice: number;
}

export interface AppliedDiscount {
  discount: number;
}

@Injectable()
export class PricingService {
  /**
   * Rejects an empty item list and any quantity that is not a positive integer.
   */
  assertItems(items: ReadonlyArray<Pick<PriceableItem, 'dishId' | 'quantity'>>): void {
    if (items.length === 0) {
      throw EngineErrors.invalidItems('An order needs at least one item');
    }
    const invalid = items.filter((item) => !Number.isInteger(item.quantity) || item.quantity <= 0);
    if (invalid.length > 0) {
      throw EngineErrors.invalidItems('Every item quantity must be a positive whole number', {
        dishIds: invalid.map((item) => item.dishId),
      });
    }
  }

  lineTotal(item: PriceableItem): number {
    return roundMoney(item.quantity * item.unitPrice);
  }

  subtotal(items: readonly PriceableItem[]): number {
    this.assertItems(items);
    const unpriced = items.filter((item) => !Number.isFinite(item.unitPrice) || item.unitPrice < 0);
    if (unpriced.length > 0) {
      throw EngineErrors.invalidItems('Item prices must be non-negative amounts', {
        dishIds: unpriced.map((item) => item.dishId),
      });
    }
    return roundMoney(items.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0));
  }

  price(items: readonly PriceableItem[], coupon?: AppliedDiscount | null): PricingBreakdown {
    const subtotal = this.subtotal(items);
    const discount = roundMoney(Math.min(Math.max(0, coupon?.discount ?? 0), subtotal));
    const total = roundMoney(Math.max(0, subtotal - discount));
    return { subtotal, discount, total };
  }
}
