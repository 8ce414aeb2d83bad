import { applyDecorators } from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiQuery,
  ApiResponse,
} from '@nestjs/swagger';
import {
  CheckoutSessionResponseDto,
  CreateCheckoutSessionDto,
} from '../../dto/checkout.dto';

/**
 * Swagger decorator for creating a hosted checkout session
 */
export const ApiCreateCheckoutSession = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Start hosted checkout',
      description:
        'Creates a hosted checkout session for the order and returns the page to redirect the shopper to.',
    }),
    ApiBody({ type: CreateCheckoutSessionDto }),
    ApiResponse({
      status: 201,
      description: 'Session created',
      type: CheckoutSessionResponseDto,
    }),
    ApiResponse({
      status: 422,
      description: 'Session could not be created',
    }),
  );
};

/**
 * Swagger decorator for the shopper return endpoint
 */
export const ApiCheckoutReturn = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Shopper return from hosted checkout',
      description:
        'Looks up the session status and redirects the shopper. Order status is only changed by payment notifications.',
    }),
    ApiQuery({ name: 'order_id', type: Number, required: true }),
    ApiQuery({ name: 'token', type: String, required: true }),
    ApiQuery({ name: 'checkoutReference', type: String, required: false }),
    ApiResponse({ status: 302, description: 'Redirect to the next page' }),
    ApiResponse({ status: 403, description: 'Return token is invalid' }),
  );
};
