import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards, UseInterceptors } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ActorRole } from '@marketplace/shared';
import { RoleGuard, Roles } from '../common/guards/role.guard';
import { LoggingInterceptor } from '../interceptors/logging.interceptor';
import { CouponService } from './coupon.service';
import { CouponPreviewResponseDto, CouponResponseDto, CreateCouponDto, PreviewCouponDto } from './dto/coupon.dto';

@Controller('coupons')
@ApiTags('coupons')
@ApiBearerAuth()
@UseGuards(RoleGuard)
@UseInterceptors(LoggingInterceptor)
export class CouponController {
  constructor(private readonly coupons: CouponService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @Roles(ActorRole.ADMIN)
  @ApiOperation({ summary: 'Create a coupon' })
  @ApiResponse({ status: 201, type: CouponResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid coupon terms' })
  @ApiResponse({ status: 409, description: 'Code already in use' })
  async create(@Body() dto: CreateCouponDto): Promise<CouponResponseDto> {
    return CouponResponseDto.fromEntity(await this.coupons.createCoupon(dto));
  }

  @Post('validate')
  @HttpCode(HttpStatus.OK)
  @Roles(ActorRole.CUSTOMER, ActorRole.ADMIN)
  @ApiOperation({
    summary: 'Preview a coupon',
    description: 'Checks a code against a subtotal without redeeming it; a rejection is reported in the body',
  })
  @ApiResponse({ status: 200, type: CouponPreviewResponseDto })
  async preview(@Body() dto: PreviewCouponDto): Promise<CouponPreviewResponseDto> {
    return CouponPreviewResponseDto.fromPreview(await this.coupons.previewCoupon(dto));
  }
}
