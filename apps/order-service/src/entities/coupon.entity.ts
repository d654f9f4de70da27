import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { CouponTerms, DiscountType } from '@marketplace/shared';
import { decimalTransformer } from './column-transformers';

@Entity('coupons')
export class Coupon implements CouponTerms {
  /** Stored upper-case. */
  @PrimaryColumn({ type: 'varchar', length: 64 })
  code!: string;

  @Column({ type: 'varchar', length: 255, default: '' })
  description!: string;

  @Column({ type: 'enum', enum: DiscountType, name: 'discount_type' })
  discountType!: DiscountType;

  @Column({ type: 'decimal', precision: 10, scale: 4, name: 'discount_value', transformer: decimalTransformer })
  discountValue!: number;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    default: 0,
    name: 'minimum_order_amount',
    transformer: decimalTransformer,
  })
  minimumOrderAmount!: number;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    name: 'max_discount_amount',
    transformer: decimalTransformer,
  })
  maxDiscountAmount!: number | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'valid_from' })
  validFrom!: Date | null;

  @Column({ type: 'timestamptz', name: 'expires_at' })
  expiresAt!: Date;

  @Column({ type: 'integer', name: 'max_redemptions' })
  maxRedemptions!: number;

  @Column({ type: 'integer', default: 0, name: 'redemption_count' })
  redemptionCount!: number;

  @Column({ type: 'boolean', default: true })
  active!: boolean;

  @Column({ type: 'jsonb', nullable: true, name: 'restaurant_ids' })
  restaurantIds!: string[] | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
