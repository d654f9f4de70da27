import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiBearerAuth, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ActorRole } from '@marketplace/shared';
import { Order } from '../entities/order.entity';
import { CallerIdentity } from '../collaborators/identity.client';
import { Caller, RoleGuard, Roles } from '../common/guards/role.guard';
import { EngineErrors } from '../common/errors/engine.exception';
import { LoggingInterceptor } from '../interceptors/logging.interceptor';
import { OrderEngineService } from './order-engine.service';
import { CreateOrderDto } from './dto/create-order.dto';
import { CancelOrderDto, ReassignCourierDto, TransitionOrderDto } from './dto/transition-order.dto';
import { CompletedOrdersQueryDto, OrderListQueryDto, StuckDispatchQueryDto } from './dto/order-query.dto';
import { OrderResponseDto, OrderTransitionResponseDto } from './dto/order-response.dto';

@Controller('orders')
@ApiTags('orders')
@ApiBearerAuth()
@UseGuards(RoleGuard)
@UseInterceptors(LoggingInterceptor)
export class OrderController {
  private readonly stuckThresholdMinutes: number;

  constructor(
    private readonly engine: OrderEngineService,
    private readonly configService: ConfigService,
  ) {
    this.stuckThresholdMinutes = Number(this.configService.get('STUCK_DISPATCH_THRESHOLD_MINUTES', 15));
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @Roles(ActorRole.CUSTOMER)
  @ApiOperation({
    summary: 'Place an order',
    description: 'Prices the items from the catalog, applies an optional coupon and stores the order as PENDING',
  })
  @ApiResponse({ status: 201, type: OrderResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid items or coupon' })
  @ApiResponse({ status: 502, description: 'Catalog unavailable' })
  async createOrder(@Body() dto: CreateOrderDto, @Caller() caller: CallerIdentity): Promise<OrderResponseDto> {
    const order = await this.engine.createOrder(
      { restaurantId: dto.restaurantId, items: dto.items, couponCode: dto.couponCode },
      caller,
    );
    return OrderResponseDto.fromEntity(order);
  }

  @Get()
  @ApiOperation({
    summary: 'List orders',
    description: 'Orders the caller is a party to, newest first; admins see all orders',
  })
  @ApiResponse({ status: 200, type: [OrderResponseDto] })
  async listOrders(@Query() query: OrderListQueryDto, @Caller() caller: CallerIdentity): Promise<OrderResponseDto[]> {
    const orders = await this.engine.listOrders(caller, { status: query.status, limit: query.limit });
    return orders.map((order) => OrderResponseDto.fromEntity(order));
  }

  // Declared before ':id' so the literal paths are not read as ids.
  @Get('completed')
  @Roles(ActorRole.ADMIN)
  @ApiOperation({ summary: 'Delivered orders for demand forecasting' })
  @ApiResponse({ status: 200, type: [OrderResponseDto] })
  async listCompleted(@Query() query: CompletedOrdersQueryDto): Promise<OrderResponseDto[]> {
    const orders = await this.engine.listCompletedOrders({ restaurantId: query.restaurantId, since: query.since });
    return orders.map((order) => OrderResponseDto.fromEntity(order));
  }

  @Get('stuck')
  @Roles(ActorRole.ADMIN)
  @ApiOperation({ summary: 'Ready orders still waiting for a courier' })
  @ApiResponse({ status: 200, type: [OrderResponseDto] })
  async listStuck(@Query() query: StuckDispatchQueryDto): Promise<OrderResponseDto[]> {
    const orders = await this.engine.findStuckDispatches(query.olderThanMinutes ?? this.stuckThresholdMinutes);
    return orders.map((order) => OrderResponseDto.fromEntity(order));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 200, type: OrderResponseDto })
  @ApiResponse({ status: 404, description: 'Order not found' })
  async getOrder(
    @Param('id', ParseUUIDPipe) orderId: string,
    @Caller() caller: CallerIdentity,
  ): Promise<OrderResponseDto> {
    const order = await this.engine.getOrder(orderId);
    this.assertCanView(order, caller);
    return OrderResponseDto.fromEntity(order);
  }

  @Get(':id/history')
  @ApiOperation({ summary: 'Committed status changes of an order, oldest first' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 200, type: [OrderTransitionResponseDto] })
  async getHistory(
    @Param('id', ParseUUIDPipe) orderId: string,
    @Caller() caller: CallerIdentity,
  ): Promise<OrderTransitionResponseDto[]> {
    this.assertCanView(await this.engine.getOrder(orderId), caller);
    const history = await this.engine.getHistory(orderId);
    return history.map((record) => OrderTransitionResponseDto.fromRecord(record));
  }

  @Patch(':id/status')
  @Roles(ActorRole.CUSTOMER, ActorRole.RESTAURANT, ActorRole.COURIER, ActorRole.ADMIN)
  @ApiOperation({ summary: 'Move an order to another status' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 200, type: OrderResponseDto })
  @ApiResponse({ status: 403, description: 'Role may not perform this move' })
  @ApiResponse({ status: 409, description: 'Illegal move, closed order or stale version' })
  async transition(
    @Param('id', ParseUUIDPipe) orderId: string,
    @Body() dto: TransitionOrderDto,
    @Caller() caller: CallerIdentity,
  ): Promise<OrderResponseDto> {
    this.assertCanView(await this.engine.getOrder(orderId), caller);
    const order = await this.engine.transition(orderId, dto.status, caller, {
      expectedVersion: dto.expectedVersion,
      note: dto.note,
    });
    return OrderResponseDto.fromEntity(order);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @Roles(ActorRole.CUSTOMER, ActorRole.RESTAURANT, ActorRole.ADMIN)
  @ApiOperation({ summary: 'Cancel an order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 200, type: OrderResponseDto })
  async cancel(
    @Param('id', ParseUUIDPipe) orderId: string,
    @Body() dto: CancelOrderDto,
    @Caller() caller: CallerIdentity,
  ): Promise<OrderResponseDto> {
    this.assertCanView(await this.engine.getOrder(orderId), caller);
    const order = await this.engine.cancel(orderId, caller, {
      expectedVersion: dto.expectedVersion,
      reason: dto.reason,
    });
    return OrderResponseDto.fromEntity(order);
  }

  @Post(':id/dispatch')
  @HttpCode(HttpStatus.OK)
  @Roles(ActorRole.ADMIN)
  @ApiOperation({ summary: 'Try to assign a courier to a ready order now' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 200, type: OrderResponseDto })
  @ApiResponse({ status: 503, description: 'No courier available' })
  async dispatch(@Param('id', ParseUUIDPipe) orderId: string): Promise<OrderResponseDto> {
    return OrderResponseDto.fromEntity(await this.engine.dispatch(orderId));
  }

  @Post(':id/reassign')
  @HttpCode(HttpStatus.OK)
  @Roles(ActorRole.ADMIN)
  @ApiOperation({ summary: 'Hand an order out for delivery to a different courier' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 200, type: OrderResponseDto })
  async reassign(
    @Param('id', ParseUUIDPipe) orderId: string,
    @Body() dto: ReassignCourierDto,
    @Caller() caller: CallerIdentity,
  ): Promise<OrderResponseDto> {
    const order = await this.engine.reassignCourier(orderId, caller, {
      expectedVersion: dto.expectedVersion,
      note: dto.note,
    });
    return OrderResponseDto.fromEntity(order);
  }

  private assertCanView(order: Order, caller: CallerIdentity): void {
    const visible =
      caller.role === ActorRole.ADMIN ||
      (caller.role === ActorRole.CUSTOMER && order.customerId === caller.userId) ||
      (caller.role === ActorRole.RESTAURANT && order.restaurantId === caller.userId) ||
      (caller.role === ActorRole.COURIER && (order.assignedCourierId === caller.userId || order.isAwaitingDispatch));
    if (!visible) {
      throw EngineErrors.orderNotFound(order.id);
    }
  }
}
