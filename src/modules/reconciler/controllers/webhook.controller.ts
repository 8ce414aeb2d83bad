import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { WebhookProcessor } from '../../../core';
import { ApiPaymentCallback } from '../../../_shared';
import { WEBHOOK_PROCESSOR } from '../constants';

/**
 * Webhook Controller
 *
 * Receives payment notifications from the processor. The answer is
 * always 200 with an empty body: the fate of a delivery is logged and
 * reported through hooks, never returned.
 */
@ApiTags('Ingest')
@Controller()
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
  ) {}

  @Post('payment-callback')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiPaymentCallback()
  async handlePaymentCallback(@Body() rawBody: Buffer | string): Promise<void> {
    try {
      const result = await this.webhookProcessor.processWebhook(rawBody);
      this.logger.debug(
        `Payment callback ${result.processingId}: ${result.processingStatus}`,
      );
    } catch (error) {
      // Only reachable with throwOnError; the processor stays silent otherwise
      this.logger.error(
        `Payment callback failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }
}
