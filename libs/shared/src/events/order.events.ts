import { ActorRole } from '../enums/actor-role.enum';
import { OrderStatus } from '../enums/order-status.enum';

/** Names of the in-process events the engine emits after a commit. */
export enum OrderEventType {
  ORDER_CREATED = 'order.created',
  ORDER_TRANSITIONED = 'order.transitioned',
  COURIER_ASSIGNED = 'order.courier-assigned',
  COURIER_RELEASED = 'order.courier-released',
}

export interface OrderCreatedEvent {
  orderId: string;
  orderNumber: string;
  customerId: string;
  restaurantId: string;
  total: number;
  couponCode?: string | null;
  occurredAt: Date;
}

export interface OrderTransitionedEvent {
  orderId: string;
  orderNumber: string;
  customerId: string;
  restaurantId: string;
  fromStatus: OrderStatus;
  toStatus: OrderStatus;
  role: ActorRole;
  version: number;
  courierId?: string | null;
  occurredAt: Date;
}

export interface CourierAssignmentEvent {
  orderId: string;
  orderNumber: string;
  courierId: string;
  restaurantId: string;
  reason?: string;
  occurredAt: Date;
}

/** Events delivered to users through the notification collaborator. */
export enum NotificationEvent {
  NEW_ORDER = 'NEW_ORDER',
  ORDER_CONFIRMED = 'ORDER_CONFIRMED',
  ORDER_OUT_FOR_DELIVERY = 'ORDER_OUT_FOR_DELIVERY',
  ORDER_DELIVERED = 'ORDER_DELIVERED',
  ORDER_CANCELLED = 'ORDER_CANCELLED',
  DELIVERY_ASSIGNED = 'DELIVERY_ASSIGNED',
  DELIVERY_UNASSIGNED = 'DELIVERY_UNASSIGNED',
}
