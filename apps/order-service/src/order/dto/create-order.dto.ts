import { ApiProperty } from '@nestjs/swagger';
import { IsArray, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class OrderItemDto {
  @ApiProperty({ description: 'Catalog dish ID' })
  @IsString()
  @IsNotEmpty()
  dishId!: string;

  // Range is checked by the engine so every bad quantity reports INVALID_ITEMS.
  @ApiProperty({ description: 'Quantity', minimum: 1 })
  @IsInt()
  quantity!: number;
}

export class CreateOrderDto {
  @ApiProperty({ description: 'Restaurant ID' })
  @IsString()
  @IsNotEmpty()
  restaurantId!: string;

  @ApiProperty({ description: 'Order items', type: [OrderItemDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => OrderItemDto)
  items!: OrderItemDto[];

  @ApiProperty({ description: 'Coupon code', required: false })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  couponCode?: string;
}
