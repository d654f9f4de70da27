import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { CourierProfile, GeoPoint, isCourierAvailable } from '@marketplace/shared';

@Entity('couriers')
@Index(['onDuty'])
export class Courier implements CourierProfile {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'jsonb' })
  position!: GeoPoint;

  /** Set false by the courier going off duty, regardless of load. */
  @Column({ type: 'boolean', default: true, name: 'on_duty' })
  onDuty!: boolean;

  @Column({ type: 'integer', default: 0, name: 'active_order_count' })
  activeOrderCount!: number;

  @Column({ type: 'integer', default: 1 })
  capacity!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  get isAvailable(): boolean {
    return isCourierAvailable(this);
  }
}

export function cloneCourier(courier: Courier): Courier {
  return Object.assign(new Courier(), { ...courier, position: { ...courier.position } });
}
