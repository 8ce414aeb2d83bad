import { Controller, Get, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { OrderStore } from '../../../core';
import { ORDER_STORE } from '../constants';
import { ApiHealthCheck } from '../../../_shared';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: Date;
  uptime: number;
  checks: {
    orderStore: boolean;
  };
}

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(ORDER_STORE)
    private readonly orderStore: OrderStore,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<HealthReport> {
    const orderStore = await this.orderStore.isHealthy();

    return {
      status: orderStore ? 'healthy' : 'degraded',
      timestamp: new Date(),
      uptime: process.uptime(),
      checks: { orderStore },
    };
  }
}
