import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Shape of `additionalData` on a processor notification
 */
export class PaymentCallbackAdditionalDataDto {
  @ApiPropertyOptional({
    enum: ['authorization', 'capture', 'refund', 'tokenization'],
    example: 'authorization',
  })
  eventType?: string;

  @ApiPropertyOptional({ description: 'Parent authorization reference' })
  originalPayfacReference?: string;

  @ApiPropertyOptional({ example: '123456' })
  authCode?: string;

  @ApiPropertyOptional({ example: '411111******1111' })
  cardNumber?: string;

  @ApiPropertyOptional({ example: '1111' })
  cardSummary?: string;

  @ApiPropertyOptional({ example: 'true' })
  threeDAuthenticated?: string;

  @ApiPropertyOptional({ description: 'Stored card token (tokenization)' })
  token?: string;
}

/**
 * Processor notification, documented for the payment callback.
 * The endpoint reads the raw body; this class is not used for validation.
 */
export class PaymentCallbackDto {
  @ApiPropertyOptional({ example: 'CR-1001' })
  checkoutReference?: string;

  @ApiProperty({ description: 'Order id', example: '42' })
  merchantReference!: string;

  @ApiPropertyOptional({ example: 'P1' })
  payfacReference?: string;

  @ApiPropertyOptional({ description: 'Minor units', example: 150000 })
  amount?: number;

  @ApiPropertyOptional({ example: 'ISK' })
  currency?: string;

  @ApiPropertyOptional({ example: 'Refused' })
  reason?: string;

  @ApiPropertyOptional({ example: 'true' })
  success?: string;

  @ApiProperty({
    description: 'Base64 HMAC-SHA256 over the signed fields',
  })
  hmacSignature!: string;

  @ApiPropertyOptional({ type: PaymentCallbackAdditionalDataDto })
  additionalData?: PaymentCallbackAdditionalDataDto;
}
