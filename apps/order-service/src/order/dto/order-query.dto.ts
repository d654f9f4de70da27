import { ApiProperty } from '@nestjs/swagger';
import { IsDate, IsEnum, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { OrderStatus } from '@marketplace/shared';

export class OrderListQueryDto {
  @ApiProperty({ enum: OrderStatus, required: false })
  @IsOptional()
  @IsEnum(OrderStatus)
  status?: OrderStatus;

  @ApiProperty({ required: false, default: 50, maximum: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  limit?: number;
}

export class CompletedOrdersQueryDto {
  @ApiProperty({ required: false })
  @IsOptional()
  @IsString()
  restaurantId?: string;

  @ApiProperty({ description: 'Only orders delivered at or after this instant', required: false })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  since?: Date;
}

export class StuckDispatchQueryDto {
  @ApiProperty({ description: 'Minimum wait in READY_FOR_PICKUP', required: false, default: 15 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1440)
  olderThanMinutes?: number;
}
