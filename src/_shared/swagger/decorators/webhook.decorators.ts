import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { PaymentCallbackDto } from '../../dto/payment-callback.dto';

/**
 * Swagger decorator for the processor payment callback
 */
export const ApiPaymentCallback = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive processor payment notification',
      description:
        'Verifies the HMAC signature, deduplicates by event key and applies the event to its order. Always answers 200 with an empty body so the processor does not retry.',
    }),
    ApiBody({
      description: 'Signed processor notification',
      type: PaymentCallbackDto,
    }),
    ApiResponse({
      status: 200,
      description: 'Notification received (outcome is logged, not returned)',
    }),
  );
};
