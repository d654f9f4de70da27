import { Entity, PrimaryColumn, Column } from 'typeorm';

/** Last order number handed out per UTC day. */
@Entity('order_sequences')
export class OrderSequence {
  /** YYYYMMDD */
  @PrimaryColumn({ type: 'varchar', length: 8 })
  day!: string;

  @Column({ type: 'integer', name: 'last_value' })
  lastValue!: number;
}
