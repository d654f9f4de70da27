import { ApiProperty } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsDate,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';
import { Type } from 'class-transformer';
import { CouponRejectionReason, DiscountType } from '@marketplace/shared';
import { Coupon } from '../../entities/coupon.entity';
import { CouponPreview } from '../coupon.service';

export class CreateCouponDto {
  @ApiProperty({ description: 'Code customers type in; stored upper-case', example: 'SAVE10' })
  @IsString()
  @Matches(/^[A-Za-z0-9_-]{3,64}$/)
  code!: string;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  description?: string;

  @ApiProperty({ enum: DiscountType })
  @IsEnum(DiscountType)
  discountType!: DiscountType;

  @ApiProperty({ description: 'Fraction in (0, 1] for PERCENTAGE, amount for FLAT', example: 0.15 })
  @IsNumber()
  @IsPositive()
  discountValue!: number;

  @ApiProperty({ required: false, default: 0 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  minimumOrderAmount?: number;

  @ApiProperty({ required: false, nullable: true, description: 'Cap on the discount amount' })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  maxDiscountAmount?: number;

  @ApiProperty({ required: false })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  validFrom?: Date;

  @ApiProperty()
  @Type(() => Date)
  @IsDate()
  expiresAt!: Date;

  @ApiProperty({ minimum: 1 })
  @IsInt()
  @Min(1)
  maxRedemptions!: number;

  @ApiProperty({ required: false, type: [String], description: 'Restaurants the coupon is limited to' })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(100)
  @IsString({ each: true })
  restaurantIds?: string[];
}

export class PreviewCouponDto {
  @ApiProperty({ example: 'SAVE10' })
  @IsString()
  @IsNotEmpty()
  code!: string;

  @ApiProperty({ description: 'Order subtotal the coupon would apply to' })
  @IsNumber()
  @Min(0)
  subtotal!: number;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsString()
  restaurantId?: string;
}

export class CouponResponseDto {
  @ApiProperty()
  code!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty({ enum: DiscountType })
  discountType!: DiscountType;

  @ApiProperty()
  discountValue!: number;

  @ApiProperty()
  minimumOrderAmount!: number;

  @ApiProperty({ nullable: true })
  maxDiscountAmount!: number | null;

  @ApiProperty({ nullable: true })
  validFrom!: Date | null;

  @ApiProperty()
  expiresAt!: Date;

  @ApiProperty()
  maxRedemptions!: number;

  @ApiProperty()
  redemptionCount!: number;

  @ApiProperty()
  active!: boolean;

  @ApiProperty({ type: [String], nullable: true })
  restaurantIds!: string[] | null;

  static fromEntity(coupon: Coupon): CouponResponseDto {
    const dto = new CouponResponseDto();
    dto.code = coupon.code;
    dto.description = coupon.description;
    dto.discountType = coupon.discountType;
    dto.discountValue = coupon.discountValue;
    dto.minimumOrderAmount = coupon.minimumOrderAmount;
    dto.maxDiscountAmount = coupon.maxDiscountAmount;
    dto.validFrom = coupon.validFrom;
    dto.expiresAt = coupon.expiresAt;
    dto.maxRedemptions = coupon.maxRedemptions;
    dto.redemptionCount = coupon.redemptionCount;
    dto.active = coupon.active;
    dto.restaurantIds = coupon.restaurantIds;
    return dto;
  }
}

export class CouponPreviewResponseDto {
  @ApiProperty()
  valid!: boolean;

  @ApiProperty()
  code!: string;

  @ApiProperty()
  subtotal!: number;

  @ApiProperty()
  discount!: number;

  @ApiProperty()
  total!: number;

  @ApiProperty({ enum: CouponRejectionReason, required: false })
  reason?: CouponRejectionReason;

  @ApiProperty({ required: false })
  message?: string;

  static fromPreview(preview: CouponPreview): CouponPreviewResponseDto {
    const dto = new CouponPreviewResponseDto();
    dto.valid = preview.valid;
    dto.code = preview.code;
    dto.subtotal = preview.subtotal;
    dto.total = preview.total;
    if (preview.valid) {
      dto.discount = preview.discount;
    } else {
      dto.discount = 0;
      dto.reason = preview.reason;
      dto.message = preview.message;
    }
    return dto;
  }
}
