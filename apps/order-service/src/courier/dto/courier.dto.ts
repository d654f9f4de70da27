import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Max, Min, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class GeoPointDto {
  @ApiProperty({ description: 'Latitude' })
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @ApiProperty({ description: 'Longitude' })
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;
}

export class RegisterCourierDto {
  @ApiProperty({ description: 'Courier display name' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: 'Current position', type: GeoPointDto })
  @ValidateNested()
  @Type(() => GeoPointDto)
  position!: GeoPointDto;

  @ApiProperty({ description: 'Maximum concurrent orders', minimum: 1 })
  @IsInt()
  @Min(1)
  capacity!: number;

  @ApiProperty({ description: 'Whether the courier is taking orders', required: false })
  @IsOptional()
  @IsBoolean()
  onDuty?: boolean;
}

export class CourierAvailabilityDto {
  @ApiProperty({ description: 'Whether the courier is taking orders' })
  @IsBoolean()
  onDuty!: boolean;
}

export class CourierResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty({ type: GeoPointDto })
  position!: GeoPointDto;

  @ApiProperty()
  onDuty!: boolean;

  @ApiProperty()
  activeOrderCount!: number;

  @ApiProperty()
  capacity!: number;

  @ApiProperty({ description: 'On duty with spare capacity' })
  available!: boolean;
}
