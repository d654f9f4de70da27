import { AssignmentStatus, CompletedOrderQuery, OrderListQuery, OrderTransitionRecord } from '@marketplace/shared';
import { Order } from '../entities/order.entity';
import { DeliveryAssignment } from '../entities/delivery-assignment.entity';

export const ORDER_STORE = Symbol('ORDER_STORE');

export type InsertOrderResult = { status: 'CREATED'; orderNumber: string } | { status: 'COUPON_EXHAUSTED' };

export interface AssignmentChange {
  open?: { courierId: string };
  close?: { courierId: string; status: AssignmentStatus };
}

/**
 * Everything one transition writes. A store applies all of it or none of it.
 */
export interface OrderCommit {
  /** Order as it should read after the commit; its version is already bumped. */
  order: Order;
  expectedVersion: number;
  transition: OrderTransitionRecord;
  assignment?: AssignmentChange;
  /** Courier whose active-order count drops by one in the same commit. */
  releaseCourierId?: string;
}

export interface OrderStore {
  findById(orderId: string): Promise<Order | null>;

  /**
   * Persists a new order with its first history entry and numbers it with the next
   * sequence of its UTC creation day. When `couponCode` is given the coupon's redemption
   * count is incremented in the same unit of work, only if it is still below the
   * maximum; an exhausted coupon consumes no sequence.
   */
  insert(order: Order, transition: OrderTransitionRecord, couponCode?: string | null): Promise<InsertOrderResult>;

  /** Compare-and-set on `expectedVersion`; false when the stored version moved on. */
  commit(change: OrderCommit): Promise<boolean>;

  findHistory(orderId: string): Promise<OrderTransitionRecord[]>;

  findAssignments(orderId: string): Promise<DeliveryAssignment[]>;

  findCompleted(query: CompletedOrderQuery): Promise<Order[]>;

  /** Newest first, at most `query.limit` rows. */
  findMany(query: OrderListQuery): Promise<Order[]>;

  /** READY_FOR_PICKUP orders with no courier that became ready before `readyBefore`. */
  findAwaitingDispatch(readyBefore: Date): Promise<Order[]>;
}
