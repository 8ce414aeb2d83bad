import {
  Body,
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  Query,
  Redirect,
  UnprocessableEntityException,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CheckoutReturnService, CheckoutService } from '../../../core';
import {
  ApiCheckoutReturn,
  ApiCreateCheckoutSession,
  CheckoutReturnQueryDto,
  CheckoutSessionResponseDto,
  CreateCheckoutSessionDto,
} from '../../../_shared';
import { CHECKOUT_RETURN_SERVICE, CHECKOUT_SERVICE } from '../constants';

/**
 * Checkout Controller
 *
 * Starts hosted checkouts and receives the shopper on the way back.
 */
@ApiTags('Checkout')
@Controller('checkout')
export class CheckoutController {
  private readonly logger = new Logger(CheckoutController.name);

  constructor(
    @Inject(CHECKOUT_SERVICE)
    private readonly checkoutService: CheckoutService,
    @Inject(CHECKOUT_RETURN_SERVICE)
    private readonly returnService: CheckoutReturnService,
  ) {}

  @Post('sessions')
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateCheckoutSession()
  async createSession(
    @Body(new ValidationPipe({ whitelist: true, transform: true }))
    dto: CreateCheckoutSessionDto,
  ): Promise<CheckoutSessionResponseDto> {
    const result = await this.checkoutService.initiateCheckout(dto.orderId, {
      isSubscription: dto.isSubscription,
    });

    if (result.result === 'failure') {
      throw new UnprocessableEntityException(result.reason);
    }

    return {
      redirectUrl: result.redirectUrl,
      checkoutReference: result.checkoutReference,
    };
  }

  @Get('return')
  @Redirect()
  @ApiCheckoutReturn()
  async handleReturn(
    @Query(new ValidationPipe({ transform: true }))
    query: CheckoutReturnQueryDto,
  ): Promise<{ url: string; statusCode: number }> {
    const decision = await this.returnService.handleReturn({
      orderId: query.order_id,
      token: query.token,
      checkoutReference: query.checkoutReference,
    });

    if (decision.kind === 'forbidden') {
      throw new ForbiddenException('Invalid return token');
    }

    if (decision.notice) {
      this.logger.debug(`Order ${query.order_id}: ${decision.notice}`);
    }

    return { url: decision.url, statusCode: HttpStatus.FOUND };
  }
}
