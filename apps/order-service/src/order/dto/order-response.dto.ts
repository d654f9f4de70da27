import { ApiProperty } from '@nestjs/swagger';
import { ActorRole, OrderStatus, OrderTransitionRecord } from '@marketplace/shared';
import { Order } from '../../entities/order.entity';

export class OrderItemResponseDto {
  @ApiProperty()
  dishId!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  quantity!: number;

  @ApiProperty({ description: 'Price per unit when the order was placed' })
  unitPrice!: number;

  @ApiProperty()
  lineTotal!: number;
}

export class OrderResponseDto {
  @ApiProperty({ description: 'Order ID' })
  id!: string;

  @ApiProperty({ description: 'Human-readable order number', example: 'ORD-20240115-0001' })
  orderNumber!: string;

  @ApiProperty()
  customerId!: string;

  @ApiProperty()
  restaurantId!: string;

  @ApiProperty({ enum: OrderStatus })
  status!: OrderStatus;

  @ApiProperty({ type: [OrderItemResponseDto] })
  items!: OrderItemResponseDto[];

  @ApiProperty()
  subtotal!: number;

  @ApiProperty()
  discount!: number;

  @ApiProperty()
  total!: number;

  @ApiProperty({ required: false, nullable: true })
  couponCode!: string | null;

  @ApiProperty({ required: false, nullable: true })
  assignedCourierId!: string | null;

  @ApiProperty({ description: 'Pass back as expectedVersion on the next write' })
  version!: number;

  @ApiProperty({ required: false, nullable: true })
  cancellationReason!: string | null;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;

  static fromEntity(order: Order): OrderResponseDto {
    const dto = new OrderResponseDto();
    dto.id = order.id;
    dto.orderNumber = order.orderNumber;
    dto.customerId = order.customerId;
    dto.restaurantId = order.restaurantId;
    dto.status = order.status;
    dto.items = order.items.map((item) => ({ ...item }));
    dto.subtotal = order.subtotal;
    dto.discount = order.discount;
    dto.total = order.total;
    dto.couponCode = order.couponCode;
    dto.assignedCourierId = order.assignedCourierId;
    dto.version = order.version;
    dto.cancellationReason = order.cancellationReason;
    dto.createdAt = order.createdAt;
    dto.updatedAt = order.updatedAt;
    return dto;
  }
}

export class OrderTransitionResponseDto {
  @ApiProperty({ enum: OrderStatus, nullable: true })
  fromStatus!: OrderStatus | null;

  @ApiProperty({ enum: OrderStatus })
  toStatus!: OrderStatus;

  @ApiProperty({ enum: ActorRole })
  role!: ActorRole;

  @ApiProperty({ nullable: true })
  actorId!: string | null;

  @ApiProperty()
  version!: number;

  @ApiProperty({ nullable: true })
  note!: string | null;

  @ApiProperty()
  occurredAt!: Date;

  static fromRecord(record: OrderTransitionRecord): OrderTransitionResponseDto {
    const dto = new OrderTransitionResponseDto();
    dto.fromStatus = record.fromStatus;
    dto.toStatus = record.toStatus;
    dto.role = record.role;
    dto.actorId = record.actorId ?? null;
    dto.version = record.version;
    dto.note = record.note ?? null;
    dto.occurredAt = record.occurredAt;
    return dto;
  }
}
