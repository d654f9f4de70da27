import { ActorRole, OrderStatus } from '@marketplace/shared';
import { Order } from '../entities/order.entity';
import { EngineException, ErrorCode, ErrorKind } from '../common/errors/engine.exception';
import { ORDER_TRANSITIONS, OrderStateMachine } from './order-state-machine';

function buildOrder(status: OrderStatus, overrides: Partial<Order> = {}): Order {
  return Object.assign(new Order(), {
    id: 'order-1',
    orderNumber: 'ORD-20240601-0001',
    customerId: 'customer-1',
    restaurantId: 'restaurant-1',
    restaurantLocation: { latitude: 0, longitude: 0 },
    items: [{ dishId: 'dish-1', name: 'Dish', quantity: 1, unitPrice: 10, lineTotal: 10 }],
    subtotal: 10,
    discount: 0,
    total: 10,
    couponCode: null,
    status,
    assignedCourierId: null,
    version: 3,
    cancellationReason: null,
    confirmedAt: null,
    preparingAt: null,
    readyAt: null,
    outForDeliveryAt: null,
    deliveredAt: null,
    cancelledAt: null,
    createdAt: new Date('2024-06-01T10:00:00Z'),
    updatedAt: new Date('2024-06-01T10:00:00Z'),
    ...overrides,
  });
}

function rejection(fn: () => void): EngineException {
  try {
    fn();
  } catch (error) {
    if (error instanceof EngineException) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the move to be rejected');
}

describe('OrderStateMachine', () => {
  const machine = new OrderStateMachine();
  const at = new Date('2024-06-01T11:00:00Z');

  it('should allow every edge of the lifecycle table for its role', () => {
    for (const from of Object.values(OrderStatus)) {
      for (const role of Object.values(ActorRole)) {
        for (const to of ORDER_TRANSITIONS[from][role] ?? []) {
          expect(machine.canTransition(from, to, role)).toBe(true);
        }
      }
    }
  });

  it('should allow exactly the thirteen listed moves', () => {
    let allowed = 0;
    for (const from of Object.values(OrderStatus)) {
      for (const to of Object.values(OrderStatus)) {
        for (const role of Object.values(ActorRole)) {
          if (machine.canTransition(from, to, role)) {
            allowed++;
          }
        }
      }
    }
    expect(allowed).toBe(13);
  });

  it('should list the moves open to a role', () => {
    expect(machine.allowedTargets(OrderStatus.PENDING, ActorRole.RESTAURANT)).toEqual([
      OrderStatus.CONFIRMED,
      OrderStatus.CANCELLED,
    ]);
    expect(machine.allowedTargets(OrderStatus.PENDING, ActorRole.COURIER)).toEqual([]);
    expect(machine.allowedTargets(OrderStatus.OUT_FOR_DELIVERY, ActorRole.ADMIN)).toEqual([OrderStatus.CANCELLED]);
  });

  it('should reject a move no role may make as an invalid transition', () => {
    const error = rejection(() =>
      machine.assertTransition(buildOrder(OrderStatus.PENDING), OrderStatus.DELIVERED, ActorRole.RESTAURANT),
    );
    expect(error.kind).toBe(ErrorKind.STATE_CONFLICT);
    expect(error.code).toBe(ErrorCode.INVALID_TRANSITION);
    expect(error.details).toEqual({ from: OrderStatus.PENDING, to: OrderStatus.DELIVERED });
  });

  it('should reject a move that belongs to another role as an authorization failure', () => {
    const error = rejection(() =>
      machine.assertTransition(buildOrder(OrderStatus.PENDING), OrderStatus.CONFIRMED, ActorRole.CUSTOMER),
    );
    expect(error.kind).toBe(ErrorKind.AUTHORIZATION);
    expect(error.code).toBe(ErrorCode.ROLE_NOT_PERMITTED);
  });

  it('should not let a customer cancel once the restaurant confirmed', () => {
    const error = rejection(() =>
      machine.assertTransition(buildOrder(OrderStatus.CONFIRMED), OrderStatus.CANCELLED, ActorRole.CUSTOMER),
    );
    expect(error.code).toBe(ErrorCode.ROLE_NOT_PERMITTED);
  });

  it('should report a closed order before anything else', () => {
    for (const status of [OrderStatus.DELIVERED, OrderStatus.CANCELLED]) {
      const error = rejection(() => machine.assertTransition(buildOrder(status), OrderStatus.CANCELLED, ActorRole.ADMIN));
      expect(error.code).toBe(ErrorCode.ORDER_CLOSED);
      expect(error.kind).toBe(ErrorKind.STATE_CONFLICT);
    }
  });

  it('should stamp the entered state and bump the version', () => {
    const order = buildOrder(OrderStatus.PENDING);
    const next = machine.apply(order, OrderStatus.CONFIRMED, at);

    expect(next.status).toBe(OrderStatus.CONFIRMED);
    expect(next.version).toBe(4);
    expect(next.confirmedAt).toEqual(at);
    expect(next.updatedAt).toEqual(at);
    expect(order.status).toBe(OrderStatus.PENDING);
    expect(order.version).toBe(3);
  });

  it('should attach the courier when going out for delivery', () => {
    const next = machine.apply(buildOrder(OrderStatus.READY_FOR_PICKUP), OrderStatus.OUT_FOR_DELIVERY, at, {
      courierId: 'courier-1',
    });
    expect(next.assignedCourierId).toBe('courier-1');
    expect(next.outForDeliveryAt).toEqual(at);
  });

  it('should refuse to go out for delivery without a courier', () => {
    expect(() => machine.apply(buildOrder(OrderStatus.READY_FOR_PICKUP), OrderStatus.OUT_FOR_DELIVERY, at)).toThrow(
      'Order order-1 needs a courier to be OUT_FOR_DELIVERY',
    );
  });

  it('should drop the courier and keep the reason on cancellation', () => {
    const order = buildOrder(OrderStatus.OUT_FOR_DELIVERY, { assignedCourierId: 'courier-1' });
    const next = machine.apply(order, OrderStatus.CANCELLED, at, { reason: 'Customer unreachable' });

    expect(next.assignedCourierId).toBeNull();
    expect(next.cancellationReason).toBe('Customer unreachable');
    expect(next.cancelledAt).toEqual(at);
  });

  it('should swap the courier without moving the status', () => {
    const order = buildOrder(OrderStatus.OUT_FOR_DELIVERY, { assignedCourierId: 'courier-1' });
    const next = machine.reassign(order, 'courier-2', at);

    expect(next.status).toBe(OrderStatus.OUT_FOR_DELIVERY);
    expect(next.assignedCourierId).toBe('courier-2');
    expect(next.version).toBe(4);
  });
});
