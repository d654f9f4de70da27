import { ActorRole, CallerContext, DiscountType, GeoPoint, NotificationEvent } from '@marketplace/shared';
import { CatalogClient, CatalogDish, CatalogRestaurant } from '../../src/collaborators/catalog.client';
import { NotificationGateway } from '../../src/collaborators/notification.gateway';
import { Coupon } from '../../src/entities/coupon.entity';

export const RESTAURANT_ID = 'restaurant-1';
export const OTHER_RESTAURANT_ID = 'restaurant-2';
export const RESTAURANT_LOCATION: GeoPoint = { latitude: 40.7128, longitude: -74.006 };

export const customer = (userId = 'customer-1'): CallerContext => ({ role: ActorRole.CUSTOMER, userId });
export const restaurant = (userId = RESTAURANT_ID): CallerContext => ({ role: ActorRole.RESTAURANT, userId });
export const courier = (userId: string): CallerContext => ({ role: ActorRole.COURIER, userId });
export const admin = (userId = 'admin-1'): CallerContext => ({ role: ActorRole.ADMIN, userId });

export class FakeCatalogClient implements CatalogClient {
  readonly dishes = new Map<string, CatalogDish>();
  readonly restaurants = new Map<string, CatalogRestaurant>();
  /** When set, every lookup rejects with this error. */
  failure: Error | null = null;

  constructor() {
    this.restaurants.set(RESTAURANT_ID, { id: RESTAURANT_ID, location: RESTAURANT_LOCATION, active: true });
    this.restaurants.set(OTHER_RESTAURANT_ID, {
      id: OTHER_RESTAURANT_ID,
      location: { latitude: 40.73, longitude: -73.99 },
      active: true,
    });
    this.addDish({ dishId: 'dish-burger', name: 'Burger', unitPrice: 12.5, restaurantId: RESTAURANT_ID, active: true });
    this.addDish({ dishId: 'dish-fries', name: 'Fries', unitPrice: 4.25, restaurantId: RESTAURANT_ID, active: true });
    this.addDish({ dishId: 'dish-soup', name: 'Soup', unitPrice: 6, restaurantId: RESTAURANT_ID, active: false });
    this.addDish({
      dishId: 'dish-sushi',
      name: 'Sushi',
      unitPrice: 18,
      restaurantId: OTHER_RESTAURANT_ID,
      active: true,
    });
  }

  addDish(dish: CatalogDish): void {
    this.dishes.set(dish.dishId, dish);
  }

  async getDishes(dishIds: string[]): Promise<CatalogDish[]> {
    if (this.failure) {
      throw this.failure;
    }
    return dishIds.flatMap((id) => {
      const dish = this.dishes.get(id);
      return dish ? [{ ...dish }] : [];
    });
  }

  async getRestaurant(restaurantId: string): Promise<CatalogRestaurant | null> {
    if (this.failure) {
      throw this.failure;
    }
    const found = this.restaurants.get(restaurantId);
    return found ? { ...found, location: { ...found.location } } : null;
  }
}

export interface SentNotification {
  userId: string;
  event: NotificationEvent;
  payload: Record<string, unknown>;
}

export class RecordingNotificationGateway implements NotificationGateway {
  readonly sent: SentNotification[] = [];
  failure: Error | null = null;

  async notify(userId: string, event: NotificationEvent, payload: Record<string, unknown>): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ userId, event, payload });
  }
}

export function buildCoupon(overrides: Partial<Coupon> = {}): Coupon {
  return Object.assign(new Coupon(), {
    code: 'SAVE10',
    description: 'Ten off',
    discountType: DiscountType.FLAT,
    discountValue: 10,
    minimumOrderAmount: 20,
    maxDiscountAmount: null,
    validFrom: null,
    expiresAt: new Date(Date.now() + 24 * 60 * 60 * 1000),
    maxRedemptions: 1,
    redemptionCount: 0,
    active: true,
    restaurantIds: null,
    createdAt: new Date(),
    updatedAt: new Date(),
    ...overrides,
  });
}

/** Lets async event listeners finish. */
export async function flushListeners(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}
