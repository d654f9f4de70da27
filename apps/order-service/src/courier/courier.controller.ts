import { Body, Controller, Get, Param, Patch, Put, UseGuards, UseInterceptors } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ActorRole } from '@marketplace/shared';
import { Courier } from '../entities/courier.entity';
import { CallerIdentity } from '../collaborators/identity.client';
import { Caller, RoleGuard, Roles } from '../common/guards/role.guard';
import { EngineException, ErrorCode, ErrorKind } from '../common/errors/engine.exception';
import { LoggingInterceptor } from '../interceptors/logging.interceptor';
import { CourierDirectoryService } from './courier-directory.service';
import { CourierAvailabilityDto, CourierResponseDto, GeoPointDto, RegisterCourierDto } from './dto/courier.dto';

function toResponse(courier: Courier): CourierResponseDto {
  return {
    id: courier.id,
    name: courier.name,
    position: { ...courier.position },
    onDuty: courier.onDuty,
    activeOrderCount: courier.activeOrderCount,
    capacity: courier.capacity,
    available: courier.onDuty && courier.activeOrderCount < courier.capacity,
  };
}

@Controller('couriers')
@ApiTags('couriers')
@ApiBearerAuth()
@UseGuards(RoleGuard)
@UseInterceptors(LoggingInterceptor)
export class CourierController {
  constructor(private readonly directory: CourierDirectoryService) {}

  @Get('available')
  @Roles(ActorRole.ADMIN, ActorRole.RESTAURANT)
  @ApiOperation({ summary: 'List couriers that can take another order' })
  @ApiResponse({ status: 200, type: [CourierResponseDto] })
  async listAvailable(): Promise<CourierResponseDto[]> {
    const couriers = await this.directory.listAvailable();
    return couriers.map(toResponse);
  }

  @Put(':id')
  @Roles(ActorRole.ADMIN, ActorRole.COURIER)
  @ApiOperation({ summary: 'Register or update a courier' })
  @ApiParam({ name: 'id', description: 'Courier ID' })
  @ApiResponse({ status: 200, type: CourierResponseDto })
  async register(
    @Param('id') courierId: string,
    @Body() dto: RegisterCourierDto,
    @Caller() caller: CallerIdentity,
  ): Promise<CourierResponseDto> {
    this.assertSelfOrAdmin(caller, courierId);
    const courier = await this.directory.register({ id: courierId, ...dto });
    return toResponse(courier);
  }

  @Patch(':id/availability')
  @Roles(ActorRole.ADMIN, ActorRole.COURIER)
  @ApiOperation({ summary: 'Go on or off duty' })
  @ApiParam({ name: 'id', description: 'Courier ID' })
  async setAvailability(
    @Param('id') courierId: string,
    @Body() dto: CourierAvailabilityDto,
    @Caller() caller: CallerIdentity,
  ): Promise<CourierResponseDto> {
    this.assertSelfOrAdmin(caller, courierId);
    return toResponse(await this.directory.setAvailability(courierId, dto.onDuty));
  }

  @Patch(':id/location')
  @Roles(ActorRole.COURIER)
  @ApiOperation({ summary: 'Report the courier position' })
  @ApiParam({ name: 'id', description: 'Courier ID' })
  async updateLocation(
    @Param('id') courierId: string,
    @Body() dto: GeoPointDto,
    @Caller() caller: CallerIdentity,
  ): Promise<CourierResponseDto> {
    this.assertSelfOrAdmin(caller, courierId);
    return toResponse(await this.directory.updateLocation(courierId, dto));
  }

  private assertSelfOrAdmin(caller: CallerIdentity, courierId: string): void {
    if (caller.role === ActorRole.COURIER && caller.userId !== courierId) {
      throw new EngineException(
        ErrorKind.AUTHORIZATION,
        ErrorCode.ROLE_NOT_PERMITTED,
        'Couriers may only manage their own profile',
        { courierId },
      );
    }
  }
}
