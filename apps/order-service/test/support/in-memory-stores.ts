import {
  AssignmentStatus,
  CompletedOrderQuery,
  GeoPoint,
  OrderListQuery,
  OrderStatus,
  OrderTransitionRecord,
  ReservationResult,
  formatOrderNumber,
  generateUUID,
  orderDayKey,
} from '@marketplace/shared';
import { Order, cloneOrder } from '../../src/entities/order.entity';
import { Courier, cloneCourier } from '../../src/entities/courier.entity';
import { Coupon } from '../../src/entities/coupon.entity';
import { DeliveryAssignment } from '../../src/entities/delivery-assignment.entity';
import { CourierProfileChange, CourierStore, ProfileWriteResult } from '../../src/persistence/courier.store';
import { CouponStore } from '../../src/persistence/coupon.store';
import { InsertOrderResult, OrderCommit, OrderStore } from '../../src/persistence/order.store';

/**
 * Stand-ins for the PostgreSQL stores. Each check-and-write runs without an await in
 * between, which gives the same atomicity as the conditional UPDATEs. The leading
 * `await tick()` lets concurrent callers interleave the way they would against a pool.
 */
const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

export class InMemoryCourierStore implements CourierStore {
  readonly couriers = new Map<string, Courier>();

  async findById(courierId: string): Promise<Courier | null> {
    await tick();
    const courier = this.couriers.get(courierId);
    return courier ? cloneCourier(courier) : null;
  }

  async findOnDuty(): Promise<Courier[]> {
    await tick();
    return [...this.couriers.values()].filter((courier) => courier.onDuty).map(cloneCourier);
  }

  async writeProfile(change: CourierProfileChange): Promise<ProfileWriteResult> {
    await tick();
    const existing = this.couriers.get(change.id);
    if (existing) {
      if (existing.activeOrderCount > change.capacity) {
        return { status: 'OVER_CAPACITY', activeOrderCount: existing.activeOrderCount };
      }
      existing.name = change.name;
      existing.position = { ...change.position };
      existing.capacity = change.capacity;
      existing.onDuty = change.onDuty ?? existing.onDuty;
      existing.updatedAt = new Date();
      return { status: 'UPDATED', courier: cloneCourier(existing) };
    }

    const created = this.put({ ...change, onDuty: change.onDuty ?? true });
    return { status: 'CREATED', courier: cloneCourier(created) };
  }

  async setOnDuty(courierId: string, onDuty: boolean): Promise<Courier | null> {
    await tick();
    const courier = this.couriers.get(courierId);
    if (!courier) {
      return null;
    }
    courier.onDuty = onDuty;
    return cloneCourier(courier);
  }

  async updatePosition(courierId: string, position: GeoPoint): Promise<Courier | null> {
    await tick();
    const courier = this.couriers.get(courierId);
    if (!courier) {
      return null;
    }
    courier.position = { ...position };
    return cloneCourier(courier);
  }

  async tryReserve(courierId: string): Promise<ReservationResult> {
    await tick();
    const courier = this.couriers.get(courierId);
    if (!courier) {
      return { ok: false, reason: 'NOT_FOUND' };
    }
    if (!courier.onDuty || courier.activeOrderCount >= courier.capacity) {
      return { ok: false, reason: 'FULL' };
    }
    courier.activeOrderCount++;
    return { ok: true };
  }

  async release(courierId: string): Promise<boolean> {
    await tick();
    return this.releaseNow(courierId);
  }

  releaseNow(courierId: string): boolean {
    const courier = this.couriers.get(courierId);
    if (!courier) {
      return false;
    }
    courier.activeOrderCount = Math.max(0, courier.activeOrderCount - 1);
    return true;
  }

  /** Seeds a courier directly, bypassing the directory's validation. */
  put(fields: Pick<Courier, 'id' | 'position' | 'capacity'> & Partial<Pick<Courier, 'name' | 'onDuty' | 'activeOrderCount'>>): Courier {
    const courier = new Courier();
    courier.id = fields.id;
    courier.name = fields.name ?? fields.id;
    courier.position = { ...fields.position };
    courier.capacity = fields.capacity;
    courier.onDuty = fields.onDuty ?? true;
    courier.activeOrderCount = fields.activeOrderCount ?? 0;
    courier.createdAt = new Date();
    courier.updatedAt = courier.createdAt;
    this.couriers.set(courier.id, courier);
    return courier;
  }
}

export class InMemoryCouponStore implements CouponStore {
  readonly coupons = new Map<string, Coupon>();

  async findByCode(code: string): Promise<Coupon | null> {
    await tick();
    const coupon = this.coupons.get(code.toUpperCase());
    return coupon ? Object.assign(new Coupon(), coupon) : null;
  }

  async create(coupon: Coupon): Promise<boolean> {
    await tick();
    const code = coupon.code.toUpperCase();
    if (this.coupons.has(code)) {
      return false;
    }
    this.coupons.set(code, Object.assign(new Coupon(), coupon, { code }));
    return true;
  }

  /** Seeds or overwrites a coupon. */
  async save(coupon: Coupon): Promise<Coupon> {
    await tick();
    const stored = Object.assign(new Coupon(), coupon, { code: coupon.code.toUpperCase() });
    this.coupons.set(stored.code, stored);
    return Object.assign(new Coupon(), stored);
  }

  redeemNow(code: string): boolean {
    const coupon = this.coupons.get(code);
    if (!coupon || coupon.redemptionCount >= coupon.maxRedemptions) {
      return false;
    }
    coupon.redemptionCount++;
    return true;
  }
}

export class InMemoryOrderStore implements OrderStore {
  readonly orders = new Map<string, Order>();
  readonly history: OrderTransitionRecord[] = [];
  readonly assignments: DeliveryAssignment[] = [];
  private readonly sequences = new Map<string, number>();
  /** Set to make the next commit behave as if another process won the race. */
  failNextCommit = false;

  constructor(
    private readonly couriers: InMemoryCourierStore,
    private readonly coupons: InMemoryCouponStore,
  ) {}

  async findById(orderId: string): Promise<Order | null> {
    await tick();
    const order = this.orders.get(orderId);
    return order ? cloneOrder(order) : null;
  }

  async insert(order: Order, transition: OrderTransitionRecord, couponCode?: string | null): Promise<InsertOrderResult> {
    await tick();
    if (couponCode && !this.coupons.redeemNow(couponCode)) {
      return { status: 'COUPON_EXHAUSTED' };
    }
    const day = orderDayKey(order.createdAt);
    const sequence = (this.sequences.get(day) ?? 0) + 1;
    this.sequences.set(day, sequence);

    const stored = cloneOrder(order);
    stored.orderNumber = formatOrderNumber(order.createdAt, sequence);
    this.orders.set(order.id, stored);
    this.history.push({ ...transition });
    return { status: 'CREATED', orderNumber: stored.orderNumber };
  }

  async commit(change: OrderCommit): Promise<boolean> {
    await tick();
    const stored = this.orders.get(change.order.id);
    if (!stored || stored.version !== change.expectedVersion || this.failNextCommit) {
      this.failNextCommit = false;
      return false;
    }

    this.orders.set(change.order.id, cloneOrder(change.order));
    this.history.push({ ...change.transition });

    const { assignment } = change;
    if (assignment?.close) {
      const closing = assignment.close;
      const open = this.assignments.find(
        (row) =>
          row.orderId === change.order.id && row.courierId === closing.courierId && row.status === AssignmentStatus.ASSIGNED,
      );
      if (open) {
        open.status = closing.status;
        open.endedAt = change.transition.occurredAt;
      }
    }
    if (assignment?.open) {
      const row = new DeliveryAssignment();
      row.id = generateUUID();
      row.orderId = change.order.id;
      row.courierId = assignment.open.courierId;
      row.status = AssignmentStatus.ASSIGNED;
      row.assignedAt = change.transition.occurredAt;
      row.endedAt = null;
      this.assignments.push(row);
    }
    if (change.releaseCourierId) {
      this.couriers.releaseNow(change.releaseCourierId);
    }
    return true;
  }

  async findHistory(orderId: string): Promise<OrderTransitionRecord[]> {
    await tick();
    return this.history.filter((record) => record.orderId === orderId).map((record) => ({ ...record }));
  }

  async findAssignments(orderId: string): Promise<DeliveryAssignment[]> {
    await tick();
    return this.assignments.filter((row) => row.orderId === orderId).map((row) => Object.assign(new DeliveryAssignment(), row));
  }

  async findCompleted(query: CompletedOrderQuery): Promise<Order[]> {
    await tick();
    return [...this.orders.values()]
      .filter((order) => order.status === OrderStatus.DELIVERED)
      .filter((order) => !query.restaurantId || order.restaurantId === query.restaurantId)
      .filter((order) => !query.since || (order.deliveredAt !== null && order.deliveredAt >= query.since))
      .sort((a, b) => (a.deliveredAt?.getTime() ?? 0) - (b.deliveredAt?.getTime() ?? 0))
      .map(cloneOrder);
  }

  async findMany(query: OrderListQuery): Promise<Order[]> {
    await tick();
    return [...this.orders.values()]
      .filter((order) => !query.customerId || order.customerId === query.customerId)
      .filter((order) => !query.restaurantId || order.restaurantId === query.restaurantId)
      .filter((order) => !query.assignedCourierId || order.assignedCourierId === query.assignedCourierId)
      .filter((order) => !query.status || order.status === query.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id))
      .slice(0, query.limit)
      .map(cloneOrder);
  }

  async findAwaitingDispatch(readyBefore: Date): Promise<Order[]> {
    await tick();
    return [...this.orders.values()]
      .filter((order) => order.isAwaitingDispatch && order.readyAt !== null && order.readyAt < readyBefore)
      .sort((a, b) => (a.readyAt?.getTime() ?? 0) - (b.readyAt?.getTime() ?? 0))
      .map(cloneOrder);
  }
}
