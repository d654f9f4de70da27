import { Injectable } from '@nestjs/common';
import { ActorRole, OrderStatus, isTerminalStatus } from '@marketplace/shared';
import { Order, cloneOrder } from '../entities/order.entity';
import { EngineErrors } from '../common/errors/engine.exception';

export type TransitionTable = Readonly<Record<OrderStatus, Partial<Record<ActorRole, readonly OrderStatus[]>>>>;

export const ORDER_TRANSITIONS: TransitionTable = {
  [OrderStatus.PENDING]: {
    [ActorRole.RESTAURANT]: [OrderStatus.CONFIRMED, OrderStatus.CANCELLED],
    [ActorRole.CUSTOMER]: [OrderStatus.CANCELLED],
    [ActorRole.ADMIN]: [OrderStatus.CANCELLED],
  },
  [OrderStatus.CONFIRMED]: {
    [ActorRole.RESTAURANT]: [OrderStatus.PREPARING, OrderStatus.CANCELLED],
    [ActorRole.ADMIN]: [OrderStatus.CANCELLED],
  },
  [OrderStatus.PREPARING]: {
    [ActorRole.RESTAURANT]: [OrderStatus.READY_FOR_PICKUP],
    [ActorRole.ADMIN]: [OrderStatus.CANCELLED],
  },
  [OrderStatus.READY_FOR_PICKUP]: {
    [ActorRole.DISPATCH]: [OrderStatus.OUT_FOR_DELIVERY],
    [ActorRole.ADMIN]: [OrderStatus.CANCELLED],
  },
  [OrderStatus.OUT_FOR_DELIVERY]: {
    [ActorRole.COURIER]: [OrderStatus.DELIVERED],
    [ActorRole.ADMIN]: [OrderStatus.CANCELLED],
  },
  [OrderStatus.DELIVERED]: {},
  [OrderStatus.CANCELLED]: {},
};

const COURIER_STATUSES: readonly OrderStatus[] = [
  OrderStatus.READY_FOR_PICKUP,
  OrderStatus.OUT_FOR_DELIVERY,
  OrderStatus.DELIVERED,
];

const COURIER_REQUIRED_STATUSES: readonly OrderStatus[] = [OrderStatus.OUT_FOR_DELIVERY, OrderStatus.DELIVERED];

export interface ApplyOptions {
  courierId?: string;
  reason?: string | null;
}

/**
 * Lifecycle rules for an order. Knows nothing about storage or couriers; it only
 * decides whether a move is legal and what the order looks like afterwards.
 */
@Injectable()
export class OrderStateMachine {
  private readonly table: TransitionTable = ORDER_TRANSITIONS;

  allowedTargets(from: OrderStatus, role: ActorRole): readonly OrderStatus[] {
    return this.table[from][role] ?? [];
  }

  canTransition(from: OrderStatus, to: OrderStatus, role: ActorRole): boolean {
    return this.allowedTargets(from, role).includes(to);
  }

  /**
   * Closed orders are reported first, then moves the table never allows, then moves
   * allowed only to some other role.
   */
  assertTransition(order: Pick<Order, 'id' | 'status'>, to: OrderStatus, role: ActorRole): void {
    if (isTerminalStatus(order.status)) {
      throw EngineErrors.orderClosed(order.id, order.status);
    }
    if (this.canTransition(order.status, to, role)) {
      return;
    }
    const rolesByTarget = Object.values(this.table[order.status]);
    const allowedForAnyone = rolesByTarget.some((targets) => targets?.includes(to));
    if (!allowedForAnyone) {
      throw EngineErrors.invalidTransition(order.status, to);
    }
    throw EngineErrors.roleNotPermitted(role, order.status, to);
  }

  /** Returns the order as it reads after moving to `to`. The input is left untouched. */
  apply(order: Order, to: OrderStatus, at: Date, options: ApplyOptions = {}): Order {
    const next = cloneOrder(order);
    next.status = to;
    next.version = order.version + 1;
    next.updatedAt = at;

    switch (to) {
      case OrderStatus.CONFIRMED:
        next.confirmedAt = at;
        break;
      case OrderStatus.PREPARING:
        next.preparingAt = at;
        break;
      case OrderStatus.READY_FOR_PICKUP:
        next.readyAt = at;
        break;
      case OrderStatus.OUT_FOR_DELIVERY:
        next.outForDeliveryAt = at;
        next.assignedCourierId = options.courierId ?? null;
        break;
      case OrderStatus.DELIVERED:
        next.deliveredAt = at;
        break;
      case OrderStatus.CANCELLED:
        next.cancelledAt = at;
        next.assignedCourierId = null;
        next.cancellationReason = options.reason ?? null;
        break;
      default:
        break;
    }

    this.assertCourierInvariant(next);
    return next;
  }

  /** Swaps the courier of an order that is out for delivery; the status does not move. */
  reassign(order: Order, courierId: string, at: Date): Order {
    const next = cloneOrder(order);
    next.assignedCourierId = courierId;
    next.version = order.version + 1;
    next.updatedAt = at;
    this.assertCourierInvariant(next);
    return next;
  }

  private assertCourierInvariant(order: Order): void {
    if (order.assignedCourierId && !COURIER_STATUSES.includes(order.status)) {
      throw new Error(`Order ${order.id} cannot hold a courier while ${order.status}`);
    }
    if (!order.assignedCourierId && COURIER_REQUIRED_STATUSES.includes(order.status)) {
      throw new Error(`Order ${order.id} needs a courier to be ${order.status}`);
    }
  }
}
