import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ActorRole,
  AssignmentStatus,
  CallerContext,
  CompletedOrderQuery,
  CouponRejectionReason,
  CourierAssignmentEvent,
  OrderCreatedEvent,
  OrderEventType,
  OrderItemSnapshot,
  OrderListQuery,
  OrderStatus,
  OrderTransitionRecord,
  OrderTransitionedEvent,
  describeError,
  generateUUID,
  validateLatitude,
  validateLongitude,
} from '@marketplace/shared';
import { Order } from '../entities/order.entity';
import { DeliveryAssignment } from '../entities/delivery-assignment.entity';
import { ORDER_STORE, OrderCommit, OrderStore } from '../persistence/order.store';
import { COUPON_STORE, CouponStore } from '../persistence/coupon.store';
import { CATALOG_CLIENT, CatalogClient, CatalogDish } from '../collaborators/catalog.client';
import { CouponValidatorService, normalizeCouponCode } from '../pricing/coupon-validator.service';
import { PricingService } from '../pricing/pricing.service';
import { CourierDirectoryService } from '../courier/courier-directory.service';
import { DispatchAssignerService } from '../dispatch/dispatch-assigner.service';
import { DispatchQueueService } from '../dispatch/dispatch-queue.service';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { EngineErrors, ErrorCode, isEngineError } from '../common/errors/engine.exception';
import { OrderStateMachine } from './order-state-machine';

export interface OrderItemRequest {
  dishId: string;
  quantity: number;
}

export interface CreateOrderInput {
  restaurantId: string;
  items: OrderItemRequest[];
  couponCode?: string | null;
}

export interface TransitionOptions {
  /** Version the caller last read; a mismatch fails with CONCURRENT_MODIFICATION. */
  expectedVersion?: number;
  note?: string | null;
  /** Stored on the order when it is cancelled. */
  reason?: string | null;
}

type PendingEvent =
  | { type: OrderEventType.ORDER_CREATED; payload: OrderCreatedEvent }
  | { type: OrderEventType.ORDER_TRANSITIONED; payload: OrderTransitionedEvent }
  | { type: OrderEventType.COURIER_ASSIGNED; payload: CourierAssignmentEvent }
  | { type: OrderEventType.COURIER_RELEASED; payload: CourierAssignmentEvent };

interface CommittedChange {
  order: Order;
  events: PendingEvent[];
}

const DISPATCH_CALLER: CallerContext = { role: ActorRole.DISPATCH };

export const ORDER_LIST_LIMIT = 50;

export interface ListOrdersOptions {
  status?: OrderStatus;
  limit?: number;
}

/**
 * Entry point for every order mutation. Writes to one order are serialised on its id
 * in this process and compare-and-set on its version in the store; events go out only
 * after the store accepted the write.
 */
@Injectable()
export class OrderEngineService {
  private readonly logger = new Logger(OrderEngineService.name);
  private readonly orderLocks = new KeyedMutex();

  constructor(
    @Inject(ORDER_STORE) private readonly orderStore: OrderStore,
    @Inject(COUPON_STORE) private readonly couponStore: CouponStore,
    @Inject(CATALOG_CLIENT) private readonly catalog: CatalogClient,
    private readonly couponValidator: CouponValidatorService,
    private readonly pricing: PricingService,
    private readonly stateMachine: OrderStateMachine,
    private readonly courierDirectory: CourierDirectoryService,
    private readonly dispatchAssigner: DispatchAssignerService,
    private readonly dispatchQueue: DispatchQueueService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async createOrder(input: CreateOrderInput, caller: CallerContext): Promise<Order> {
    if (caller.role !== ActorRole.CUSTOMER) {
      throw EngineErrors.actionNotPermitted(caller.role, 'place orders');
    }
    const customerId = caller.userId;
    if (!customerId) {
      throw EngineErrors.unauthenticated('Placing an order needs a customer id');
    }
    this.pricing.assertItems(input.items);

    const restaurant = await this.catalog.getRestaurant(input.restaurantId);
    if (!restaurant || !restaurant.active) {
      throw EngineErrors.catalog(ErrorCode.UNKNOWN_RESTAURANT, `Restaurant ${input.restaurantId} is not accepting orders`, {
        restaurantId: input.restaurantId,
      });
    }
    const { location } = restaurant;
    if (!location || !validateLatitude(location.latitude) || !validateLongitude(location.longitude)) {
      this.logger.warn(`Catalog returned an unusable location for restaurant ${input.restaurantId}`, { location });
      throw EngineErrors.catalog(ErrorCode.UNKNOWN_RESTAURANT, `Restaurant ${input.restaurantId} has no valid location`, {
        restaurantId: input.restaurantId,
      });
    }

    const dishIds = [...new Set(input.items.map((item) => item.dishId))];
    const dishes = await this.catalog.getDishes(dishIds);
    const items = this.snapshotItems(input, dishes);
    const subtotal = this.pricing.subtotal(items);

    const now = new Date();
    let couponCode: string | null = null;
    let discount = 0;
    if (input.couponCode) {
      const code = normalizeCouponCode(input.couponCode);
      const coupon = await this.couponStore.findByCode(code);
      const verdict = this.couponValidator.validate(code, coupon, subtotal, now, input.restaurantId);
      if (!verdict.valid) {
        throw EngineErrors.coupon(verdict.reason, verdict.message, verdict.code);
      }
      couponCode = verdict.code;
      discount = verdict.discount;
    }

    const totals = this.pricing.price(items, { discount });

    const order = new Order();
    order.id = generateUUID();
    order.customerId = customerId;
    order.restaurantId = input.restaurantId;
    order.restaurantLocation = { latitude: location.latitude, longitude: location.longitude };
    order.items = items;
    order.subtotal = totals.subtotal;
    order.discount = totals.discount;
    order.total = totals.total;
    order.couponCode = couponCode;
    order.status = OrderStatus.PENDING;
    order.assignedCourierId = null;
    order.version = 1;
    order.cancellationReason = null;
    order.confirmedAt = null;
    order.preparingAt = null;
    order.readyAt = null;
    order.outForDeliveryAt = null;
    order.deliveredAt = null;
    order.cancelledAt = null;
    order.createdAt = now;
    order.updatedAt = now;

    const outcome = await this.orderStore.insert(order, this.record(order, null, caller, now, null), couponCode);
    if (outcome.status === 'COUPON_EXHAUSTED') {
      // Another order took the last redemption between validation and insert.
      throw EngineErrors.coupon(
        CouponRejectionReason.EXHAUSTED,
        'Coupon has reached its redemption limit',
        couponCode ?? '',
      );
    }
    order.orderNumber = outcome.orderNumber;

    this.logger.log(`Created order ${order.orderNumber}`, {
      orderId: order.id,
      customerId: order.customerId,
      restaurantId: order.restaurantId,
      total: order.total,
      couponCode,
    });

    this.publish([
      {
        type: OrderEventType.ORDER_CREATED,
        payload: {
          orderId: order.id,
          orderNumber: order.orderNumber,
          customerId: order.customerId,
          restaurantId: order.restaurantId,
          total: order.total,
          couponCode,
          occurredAt: now,
        },
      },
    ]);
    return order;
  }

  /**
   * Moves an order to `target` on behalf of `caller`. Entering READY_FOR_PICKUP also
   * makes one dispatch attempt; the returned order reflects its outcome.
   */
  async transition(
    orderId: string,
    target: OrderStatus,
    caller: CallerContext,
    options: TransitionOptions = {},
  ): Promise<Order> {
    const change = await this.orderLocks.runExclusive(orderId, () =>
      this.applyTransition(orderId, target, caller, options),
    );
    this.publish(change.events);

    if (change.order.status === OrderStatus.READY_FOR_PICKUP) {
      return this.dispatchAfterReady(change.order);
    }
    return change.order;
  }

  cancel(orderId: string, caller: CallerContext, options: TransitionOptions = {}): Promise<Order> {
    return this.transition(orderId, OrderStatus.CANCELLED, caller, options);
  }

  /** Assigns a courier to a READY_FOR_PICKUP order and sends it out for delivery. */
  dispatch(orderId: string): Promise<Order> {
    return this.transition(orderId, OrderStatus.OUT_FOR_DELIVERY, DISPATCH_CALLER);
  }

  async reassignCourier(orderId: string, caller: CallerContext, options: TransitionOptions = {}): Promise<Order> {
    if (caller.role !== ActorRole.ADMIN) {
      throw EngineErrors.actionNotPermitted(caller.role, 'reassign couriers');
    }

    const change = await this.orderLocks.runExclusive(orderId, async (): Promise<CommittedChange> => {
      const order = await this.loadForWrite(orderId, options.expectedVersion);
      if (order.isClosed) {
        throw EngineErrors.orderClosed(order.id, order.status);
      }
      const previousCourierId = order.assignedCourierId;
      if (order.status !== OrderStatus.OUT_FOR_DELIVERY || !previousCourierId) {
        throw EngineErrors.invalidTransition(order.status, OrderStatus.OUT_FOR_DELIVERY);
      }

      const result = await this.dispatchAssigner.assign(order, { exclude: [previousCourierId] });
      if (result.status === 'NO_COURIER_AVAILABLE') {
        throw EngineErrors.noCourierAvailable(order.id, result.attempted);
      }

      const now = new Date();
      const next = this.stateMachine.reassign(order, result.courierId, now);
      const note = options.note ?? `Courier ${previousCourierId} replaced by ${result.courierId}`;
      await this.commitOrRelease(
        {
          order: next,
          expectedVersion: order.version,
          transition: this.record(next, order.status, caller, now, note),
          assignment: {
            open: { courierId: result.courierId },
            close: { courierId: previousCourierId, status: AssignmentStatus.REASSIGNED },
          },
          releaseCourierId: previousCourierId,
        },
        result.courierId,
      );

      this.logger.log(`Reassigned order ${order.id} to courier ${result.courierId}`, {
        orderId: order.id,
        previousCourierId,
        courierId: result.courierId,
      });

      return {
        order: next,
        events: [
          this.courierEvent(OrderEventType.COURIER_RELEASED, next, previousCourierId, now, 'REASSIGNED'),
          this.courierEvent(OrderEventType.COURIER_ASSIGNED, next, result.courierId, now),
        ],
      };
    });

    this.publish(change.events);
    return change.order;
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.orderStore.findById(orderId);
    if (!order) {
      throw EngineErrors.orderNotFound(orderId);
    }
    return order;
  }

  async getHistory(orderId: string): Promise<OrderTransitionRecord[]> {
    await this.getOrder(orderId);
    return this.orderStore.findHistory(orderId);
  }

  async getAssignments(orderId: string): Promise<DeliveryAssignment[]> {
    await this.getOrder(orderId);
    return this.orderStore.findAssignments(orderId);
  }

  /**
   * Orders the caller is a party to, newest first: a customer's own orders, a restaurant's
   * incoming orders, a courier's assigned orders. Admins see every order.
   */
  async listOrders(caller: CallerContext, options: ListOrdersOptions = {}): Promise<Order[]> {
    const limit = Math.min(Math.max(Math.trunc(options.limit ?? ORDER_LIST_LIMIT), 1), ORDER_LIST_LIMIT);
    const query: OrderListQuery = { status: options.status, limit };
    if (caller.role === ActorRole.ADMIN) {
      return this.orderStore.findMany(query);
    }
    if (caller.role === ActorRole.DISPATCH) {
      throw EngineErrors.actionNotPermitted(caller.role, 'list orders');
    }
    if (!caller.userId) {
      throw EngineErrors.unauthenticated('Listing orders needs a user id');
    }

    switch (caller.role) {
      case ActorRole.CUSTOMER:
        query.customerId = caller.userId;
        break;
      case ActorRole.RESTAURANT:
        query.restaurantId = caller.userId;
        break;
      case ActorRole.COURIER:
        query.assignedCourierId = caller.userId;
        break;
    }
    return this.orderStore.findMany(query);
  }

  /** Delivered orders, oldest delivery first, for demand forecasting. */
  listCompletedOrders(query: CompletedOrderQuery = {}): Promise<Order[]> {
    return this.orderStore.findCompleted(query);
  }

  /** READY_FOR_PICKUP orders still without a courier after `olderThanMinutes`. */
  findStuckDispatches(olderThanMinutes: number, now: Date = new Date()): Promise<Order[]> {
    const readyBefore = new Date(now.getTime() - olderThanMinutes * 60_000);
    return this.orderStore.findAwaitingDispatch(readyBefore);
  }

  private async applyTransition(
    orderId: string,
    target: OrderStatus,
    caller: CallerContext,
    options: TransitionOptions,
  ): Promise<CommittedChange> {
    const order = await this.loadForWrite(orderId, options.expectedVersion);
    this.stateMachine.assertTransition(order, target, caller.role);

    if (
      target === OrderStatus.DELIVERED &&
      caller.role === ActorRole.COURIER &&
      caller.userId !== undefined &&
      caller.userId !== order.assignedCourierId
    ) {
      throw EngineErrors.notAssignedCourier(order.id, caller.userId);
    }

    let reservedCourierId: string | undefined;
    if (target === OrderStatus.OUT_FOR_DELIVERY) {
      const result = await this.dispatchAssigner.assign(order);
      if (result.status === 'NO_COURIER_AVAILABLE') {
        throw EngineErrors.noCourierAvailable(order.id, result.attempted);
      }
      reservedCourierId = result.courierId;
    }

    const now = new Date();
    const next = this.stateMachine.apply(order, target, now, {
      courierId: reservedCourierId,
      reason: options.reason ?? options.note ?? null,
    });

    const commit: OrderCommit = {
      order: next,
      expectedVersion: order.version,
      transition: this.record(next, order.status, caller, now, options.note ?? options.reason ?? null),
    };
    const heldCourierId = order.assignedCourierId;
    if (reservedCourierId) {
      commit.assignment = { open: { courierId: reservedCourierId } };
    } else if (heldCourierId && target === OrderStatus.DELIVERED) {
      commit.assignment = { close: { courierId: heldCourierId, status: AssignmentStatus.COMPLETED } };
      commit.releaseCourierId = heldCourierId;
    } else if (heldCourierId && target === OrderStatus.CANCELLED) {
      commit.assignment = { close: { courierId: heldCourierId, status: AssignmentStatus.RELEASED } };
      commit.releaseCourierId = heldCourierId;
    }

    await this.commitOrRelease(commit, reservedCourierId);

    this.logger.log(`Order ${order.id} moved ${order.status} -> ${target}`, {
      orderId: order.id,
      role: caller.role,
      version: next.version,
      courierId: next.assignedCourierId,
    });

    const events: PendingEvent[] = [
      {
        type: OrderEventType.ORDER_TRANSITIONED,
        payload: {
          orderId: next.id,
          orderNumber: next.orderNumber,
          customerId: next.customerId,
          restaurantId: next.restaurantId,
          fromStatus: order.status,
          toStatus: target,
          role: caller.role,
          version: next.version,
          courierId: next.assignedCourierId,
          occurredAt: now,
        },
      },
    ];
    if (reservedCourierId) {
      events.push(this.courierEvent(OrderEventType.COURIER_ASSIGNED, next, reservedCourierId, now));
    }
    if (heldCourierId && target === OrderStatus.CANCELLED) {
      events.push(this.courierEvent(OrderEventType.COURIER_RELEASED, next, heldCourierId, now, 'CANCELLED'));
    }
    return { order: next, events };
  }

  private async loadForWrite(orderId: string, expectedVersion?: number): Promise<Order> {
    const order = await this.getOrder(orderId);
    if (expectedVersion !== undefined && expectedVersion !== order.version) {
      throw EngineErrors.concurrentModification(orderId, expectedVersion, order.version);
    }
    return order;
  }

  /** A courier reserved for a write the store refused goes back to the pool. */
  private async commitOrRelease(commit: OrderCommit, reservedCourierId?: string): Promise<void> {
    let committed: boolean;
    try {
      committed = await this.orderStore.commit(commit);
    } catch (error) {
      if (reservedCourierId) {
        await this.courierDirectory.release(reservedCourierId);
      }
      throw error;
    }
    if (!committed) {
      if (reservedCourierId) {
        await this.courierDirectory.release(reservedCourierId);
      }
      throw EngineErrors.concurrentModification(commit.order.id, commit.expectedVersion);
    }
  }

  private async dispatchAfterReady(order: Order): Promise<Order> {
    try {
      return await this.dispatch(order.id);
    } catch (error) {
      if (isEngineError(error, ErrorCode.NO_COURIER_AVAILABLE)) {
        await this.scheduleRetry(order.id, 'NO_COURIER_AVAILABLE');
      } else if (isEngineError(error) && !error.retryable) {
        // Someone else moved the order first (cancelled it, for instance).
        this.logger.log(`Dispatch of order ${order.id} not needed: ${error.code}`, { orderId: order.id });
      } else {
        this.logger.error(`Dispatch attempt for order ${order.id} failed`, {
          orderId: order.id,
          error: describeError(error),
        });
        await this.scheduleRetry(order.id, 'DISPATCH_FAILED');
      }
      return this.getOrder(order.id);
    }
  }

  private async scheduleRetry(orderId: string, reason: string): Promise<void> {
    try {
      await this.dispatchQueue.scheduleRetry(orderId, reason);
    } catch (error) {
      // The stuck-dispatch monitor picks the order up again.
      this.logger.error(`Could not schedule dispatch retry for order ${orderId}`, {
        orderId,
        error: describeError(error),
      });
    }
  }

  private snapshotItems(input: CreateOrderInput, dishes: CatalogDish[]): OrderItemSnapshot[] {
    const byId = new Map(dishes.map((dish) => [dish.dishId, dish]));

    const unknown = input.items.filter((item) => !byId.has(item.dishId)).map((item) => item.dishId);
    if (unknown.length > 0) {
      throw EngineErrors.catalog(ErrorCode.UNKNOWN_DISH, 'Some dishes do not exist', { dishIds: unknown });
    }

    const found = input.items.flatMap((item) => {
      const dish = byId.get(item.dishId);
      return dish ? [{ item, dish }] : [];
    });

    const foreign = found.filter(({ dish }) => dish.restaurantId !== input.restaurantId);
    if (foreign.length > 0) {
      throw EngineErrors.catalog(ErrorCode.MIXED_RESTAURANTS, 'All dishes must come from the ordered restaurant', {
        restaurantId: input.restaurantId,
        dishIds: foreign.map(({ dish }) => dish.dishId),
      });
    }

    const inactive = found.filter(({ dish }) => !dish.active);
    if (inactive.length > 0) {
      throw EngineErrors.catalog(ErrorCode.DISH_UNAVAILABLE, 'Some dishes are not available right now', {
        dishIds: inactive.map(({ dish }) => dish.dishId),
      });
    }

    return found.map(({ item, dish }) => ({
      dishId: dish.dishId,
      name: dish.name,
      quantity: item.quantity,
      unitPrice: dish.unitPrice,
      lineTotal: this.pricing.lineTotal({ dishId: dish.dishId, quantity: item.quantity, unitPrice: dish.unitPrice }),
    }));
  }

  private record(
    order: Order,
    fromStatus: OrderStatus | null,
    caller: CallerContext,
    at: Date,
    note: string | null,
  ): OrderTransitionRecord {
    return {
      orderId: order.id,
      fromStatus,
      toStatus: order.status,
      role: caller.role,
      actorId: caller.userId ?? null,
      version: order.version,
      note,
      occurredAt: at,
    };
  }

  private courierEvent(
    type: OrderEventType.COURIER_ASSIGNED | OrderEventType.COURIER_RELEASED,
    order: Order,
    courierId: string,
    at: Date,
    reason?: string,
  ): PendingEvent {
    return {
      type,
      payload: {
        orderId: order.id,
        orderNumber: order.orderNumber,
        courierId,
        restaurantId: order.restaurantId,
        reason,
        occurredAt: at,
      },
    };
  }

  private publish(events: PendingEvent[]): void {
    for (const event of events) {
      try {
        this.eventEmitter.emit(event.type, event.payload);
      } catch (error) {
        this.logger.error(`Listener for ${event.type} failed`, {
          orderId: event.payload.orderId,
          error: describeError(error),
        });
      }
    }
  }
}
