import { ActorRole } from '../enums/actor-role.enum';
import { OrderStatus } from '../enums/order-status.enum';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/** A dish as it was priced when the order was placed. */
export interface OrderItemSnapshot {
  dishId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface PricingBreakdown {
  subtotal: number;
  discount: number;
  total: number;
}

export interface CallerContext {
  role: ActorRole;
  userId?: string;
}

export interface OrderTransitionRecord {
  orderId: string;
  fromStatus: OrderStatus | null;
  toStatus: OrderStatus;
  role: ActorRole;
  actorId?: string | null;
  version: number;
  note?: string | null;
  occurredAt: Date;
}

export interface CompletedOrderQuery {
  restaurantId?: string;
  since?: Date;
}

/** Orders visible to one party; unset party fields do not filter. */
export interface OrderListQuery {
  customerId?: string;
  restaurantId?: string;
  assignedCourierId?: string;
  status?: OrderStatus;
  limit: number;
}
