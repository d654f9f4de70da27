import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { GeoPoint, OrderItemSnapshot, OrderStatus, isTerminalStatus } from '@marketplace/shared';
import { decimalTransformer } from './column-transformers';

@Entity('orders')
@Index(['customerId', 'status'])
@Index(['restaurantId', 'status'])
@Index(['status', 'readyAt'])
export class Order {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 32, name: 'order_number', unique: true })
  orderNumber!: string;

  @Column({ type: 'varchar', length: 64, name: 'customer_id' })
  customerId!: string;

  @Column({ type: 'varchar', length: 64, name: 'restaurant_id' })
  restaurantId!: string;

  @Column({ type: 'jsonb', name: 'restaurant_location' })
  restaurantLocation!: GeoPoint;

  @Column({ type: 'jsonb' })
  items!: OrderItemSnapshot[];

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  subtotal!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  discount!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  total!: number;

  @Column({ type: 'varchar', length: 64, nullable: true, name: 'coupon_code' })
  couponCode!: string | null;

  @Column({ type: 'enum', enum: OrderStatus, default: OrderStatus.PENDING })
  @Index()
  status!: OrderStatus;

  @Column({ type: 'varchar', length: 64, nullable: true, name: 'assigned_courier_id' })
  @Index()
  assignedCourierId!: string | null;

  /** Bumped on every committed transition; compared on write. */
  @Column({ type: 'integer', default: 1 })
  version!: number;

  @Column({ type: 'text', nullable: true, name: 'cancellation_reason' })
  cancellationReason!: string | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'confirmed_at' })
  confirmedAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'preparing_at' })
  preparingAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'ready_at' })
  readyAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'out_for_delivery_at' })
  outForDeliveryAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'delivered_at' })
  deliveredAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'cancelled_at' })
  cancelledAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @Column({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  get isClosed(): boolean {
    return isTerminalStatus(this.status);
  }

  get isAwaitingDispatch(): boolean {
    return this.status === OrderStatus.READY_FOR_PICKUP && !this.assignedCourierId;
  }
}

export function cloneOrder(order: Order): Order {
  return Object.assign(new Order(), {
    ...order,
    restaurantLocation: { ...order.restaurantLocation },
    items: order.items.map((item) => ({ ...item })),
  });
}
