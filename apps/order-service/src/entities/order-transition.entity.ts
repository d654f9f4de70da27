import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { ActorRole, OrderStatus, OrderTransitionRecord } from '@marketplace/shared';

/** Append-only audit trail of committed transitions. */
@Entity('order_transitions')
@Index(['orderId', 'occurredAt'])
export class OrderTransition implements OrderTransitionRecord {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'uuid', name: 'order_id' })
  orderId!: string;

  @Column({ type: 'enum', enum: OrderStatus, nullable: true, name: 'from_status' })
  fromStatus!: OrderStatus | null;

  @Column({ type: 'enum', enum: OrderStatus, name: 'to_status' })
  toStatus!: OrderStatus;

  @Column({ type: 'enum', enum: ActorRole })
  role!: ActorRole;

  @Column({ type: 'varchar', length: 64, nullable: true, name: 'actor_id' })
  actorId!: string | null;

  @Column({ type: 'integer' })
  version!: number;

  @Column({ type: 'text', nullable: true })
  note!: string | null;

  @Column({ type: 'timestamptz', name: 'occurred_at' })
  occurredAt!: Date;
}
