import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, IsNull, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import {
  AssignmentStatus,
  CompletedOrderQuery,
  OrderListQuery,
  OrderStatus,
  OrderTransitionRecord,
  formatOrderNumber,
  generateUUID,
  orderDayKey,
} from '@marketplace/shared';
import { Order } from '../entities/order.entity';
import { OrderTransition } from '../entities/order-transition.entity';
import { DeliveryAssignment } from '../entities/delivery-assignment.entity';
import { Coupon } from '../entities/coupon.entity';
import { Courier } from '../entities/courier.entity';
import { InsertOrderResult, OrderCommit, OrderStore } from './order.store';

@Injectable()
export class TypeOrmOrderStore implements OrderStore {
  constructor(
    @InjectRepository(Order) private readonly orderRepo: Repository<Order>,
    @InjectRepository(OrderTransition) private readonly transitionRepo: Repository<OrderTransition>,
    @InjectRepository(DeliveryAssignment) private readonly assignmentRepo: Repository<DeliveryAssignment>,
    private readonly dataSource: DataSource,
  ) {}

  findById(orderId: string): Promise<Order | null> {
    return this.orderRepo.findOne({ where: { id: orderId } });
  }

  insert(order: Order, transition: OrderTransitionRecord, couponCode?: string | null): Promise<InsertOrderResult> {
    return this.dataSource.transaction(async (manager): Promise<InsertOrderResult> => {
      if (couponCode) {
        const redeemed = await manager
          .createQueryBuilder()
          .update(Coupon)
          .set({ redemptionCount: () => 'redemption_count + 1' })
          .where('code = :code', { code: couponCode })
          .andWhere('redemption_count < max_redemptions')
          .execute();
        if (!redeemed.affected) {
          return { status: 'COUPON_EXHAUSTED' };
        }
      }

      // The day's counter row stays locked until this transaction ends.
      const sequence = await this.allocateSequence(manager, orderDayKey(order.createdAt));
      const orderNumber = formatOrderNumber(order.createdAt, sequence);
      await manager.insert(Order, { ...order, orderNumber });
      await manager.insert(OrderTransition, this.toTransitionRow(transition));
      return { status: 'CREATED', orderNumber };
    });
  }

  commit(change: OrderCommit): Promise<boolean> {
    const { order, expectedVersion, transition, assignment, releaseCourierId } = change;

    return this.dataSource.transaction(async (manager): Promise<boolean> => {
      const updated = await manager
        .createQueryBuilder()
        .update(Order)
        .set({
          status: order.status,
          assignedCourierId: order.assignedCourierId,
          version: order.version,
          cancellationReason: order.cancellationReason,
          confirmedAt: order.confirmedAt,
          preparingAt: order.preparingAt,
          readyAt: order.readyAt,
          outForDeliveryAt: order.outForDeliveryAt,
          deliveredAt: order.deliveredAt,
          cancelledAt: order.cancelledAt,
          updatedAt: order.updatedAt,
        })
        .where('id = :id', { id: order.id })
        .andWhere('version = :expectedVersion', { expectedVersion })
        .execute();

      if (updated.affected !== 1) {
        return false;
      }

      await manager.insert(OrderTransition, this.toTransitionRow(transition));

      if (assignment?.close) {
        await manager.update(
          DeliveryAssignment,
          { orderId: order.id, courierId: assignment.close.courierId, status: AssignmentStatus.ASSIGNED },
          { status: assignment.close.status, endedAt: transition.occurredAt },
        );
      }

      if (assignment?.open) {
        await manager.insert(DeliveryAssignment, {
          id: generateUUID(),
          orderId: order.id,
          courierId: assignment.open.courierId,
          status: AssignmentStatus.ASSIGNED,
          assignedAt: transition.occurredAt,
          endedAt: null,
        });
      }

      if (releaseCourierId) {
        await manager
          .createQueryBuilder()
          .update(Courier)
          .set({ activeOrderCount: () => 'GREATEST(active_order_count - 1, 0)' })
          .where('id = :id', { id: releaseCourierId })
          .execute();
      }

      return true;
    });
  }

  async findHistory(orderId: string): Promise<OrderTransitionRecord[]> {
    const rows = await this.transitionRepo.find({
      where: { orderId },
      order: { occurredAt: 'ASC', id: 'ASC' },
    });
    return rows.map((row) => ({
      orderId: row.orderId,
      fromStatus: row.fromStatus,
      toStatus: row.toStatus,
      role: row.role,
      actorId: row.actorId,
      version: row.version,
      note: row.note,
      occurredAt: row.occurredAt,
    }));
  }

  findAssignments(orderId: string): Promise<DeliveryAssignment[]> {
    return this.assignmentRepo.find({ where: { orderId }, order: { assignedAt: 'ASC' } });
  }

  findCompleted(query: CompletedOrderQuery): Promise<Order[]> {
    const where: FindOptionsWhere<Order> = { status: OrderStatus.DELIVERED };
    if (query.restaurantId) {
      where.restaurantId = query.restaurantId;
    }
    if (query.since) {
      where.deliveredAt = MoreThanOrEqual(query.since);
    }
    return this.orderRepo.find({ where, order: { deliveredAt: 'ASC' } });
  }

  findMany(query: OrderListQuery): Promise<Order[]> {
    const where: FindOptionsWhere<Order> = {};
    if (query.customerId) {
      where.customerId = query.customerId;
    }
    if (query.restaurantId) {
      where.restaurantId = query.restaurantId;
    }
    if (query.assignedCourierId) {
      where.assignedCourierId = query.assignedCourierId;
    }
    if (query.status) {
      where.status = query.status;
    }
    return this.orderRepo.find({ where, order: { createdAt: 'DESC', id: 'DESC' }, take: query.limit });
  }

  findAwaitingDispatch(readyBefore: Date): Promise<Order[]> {
    return this.orderRepo.find({
      where: {
        status: OrderStatus.READY_FOR_PICKUP,
        assignedCourierId: IsNull(),
        readyAt: LessThan(readyBefore),
      },
      order: { readyAt: 'ASC' },
    });
  }

  private async allocateSequence(manager: EntityManager, day: string): Promise<number> {
    const rows: unknown = await manager.query(
      `INSERT INTO order_sequences (day, last_value) VALUES ($1, 1)
       ON CONFLICT (day) DO UPDATE SET last_value = order_sequences.last_value + 1
       RETURNING last_value`,
      [day],
    );
    const first: unknown = Array.isArray(rows) ? rows[0] : undefined;
    if (typeof first === 'object' && first !== null && 'last_value' in first) {
      const value = Number(first.last_value);
      if (Number.isInteger(value) && value > 0) {
        return value;
      }
    }
    throw new Error(`Order sequence allocation for ${day} returned no value`);
  }

  private toTransitionRow(record: OrderTransitionRecord): Partial<OrderTransition> {
    return {
      orderId: record.orderId,
      fromStatus: record.fromStatus,
      toStatus: record.toStatus,
      role: record.role,
      actorId: record.actorId ?? null,
      version: record.version,
      note: record.note ?? null,
      occurredAt: record.occurredAt,
    };
  }
}
