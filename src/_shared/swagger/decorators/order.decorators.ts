import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import {
  BridgeOutcomeDto,
  OrderStatusTransitionDto,
} from '../../dto/order-transition.dto';

/**
 * Swagger decorator for order status change notifications
 */
export const ApiOrderStatusTransition = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Notify an order status change',
      description:
        'Called by the commerce platform after a merchant changes an order status. Sends capture, cancel or refund to the processor where the change calls for it.',
    }),
    ApiParam({
      name: 'orderId',
      description: 'Platform order id',
      example: 42,
    }),
    ApiBody({ type: OrderStatusTransitionDto }),
    ApiResponse({
      status: 200,
      description: 'Outcome of the processor command, if any',
      type: BridgeOutcomeDto,
    }),
  );
};
