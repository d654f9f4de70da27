import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { AssignmentStatus } from '@marketplace/shared';

@Entity('delivery_assignments')
@Index(['orderId'])
@Index(['courierId', 'status'])
export class DeliveryAssignment {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'order_id' })
  orderId!: string;

  @Column({ type: 'varchar', length: 64, name: 'courier_id' })
  courierId!: string;

  @Column({ type: 'enum', enum: AssignmentStatus, default: AssignmentStatus.ASSIGNED })
  status!: AssignmentStatus;

  @Column({ type: 'timestamptz', name: 'assigned_at' })
  assignedAt!: Date;

  @Column({ type: 'timestamptz', nullable: true, name: 'ended_at' })
  endedAt!: Date | null;
}
