import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  ParseIntPipe,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { BridgeOutcome, OrderLifecycleBridge } from '../../../core';
import {
  ApiOrderStatusTransition,
  OrderStatusTransitionDto,
} from '../../../_shared';
import { LIFECYCLE_BRIDGE } from '../constants';

/**
 * Order status change notifications from the commerce platform
 */
@ApiTags('Orders')
@Controller('orders')
export class OrderTransitionController {
  constructor(
    @Inject(LIFECYCLE_BRIDGE)
    private readonly bridge: OrderLifecycleBridge,
  ) {}

  @Post(':orderId/status-transitions')
  @HttpCode(HttpStatus.OK)
  @ApiOrderStatusTransition()
  async notifyStatusTransition(
    @Param('orderId', ParseIntPipe) orderId: number,
    @Body(new ValidationPipe({ whitelist: true }))
    dto: OrderStatusTransitionDto,
  ): Promise<BridgeOutcome> {
    return this.bridge.handleStatusTransition(orderId, dto.from, dto.to);
  }
}
