import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';

/**
 * DTO for starting a hosted checkout
 */
export class CreateCheckoutSessionDto {
  @ApiProperty({
    description: 'Order to pay for',
    example: 42,
    minimum: 1,
  })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  orderId!: number;

  @ApiPropertyOptional({
    description: 'First payment of a subscription; stores a card token',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  isSubscription?: boolean;
}

export class CheckoutSessionResponseDto {
  @ApiProperty({
    description: 'Hosted checkout page to send the shopper to',
    example: 'https://checkout.example.com/session/abc',
  })
  redirectUrl!: string;

  @ApiProperty({ example: 'CR-1001' })
  checkoutReference!: string;
}

/**
 * Query string of the shopper return URL
 */
export class CheckoutReturnQueryDto {
  @ApiProperty({ name: 'order_id', example: 42 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  order_id!: number;

  @ApiPropertyOptional({ description: 'Return token issued with the session' })
  @IsOptional()
  @IsString()
  token?: string;

  @ApiPropertyOptional({ example: 'CR-1001' })
  @IsOptional()
  @IsString()
  checkoutReference?: string;
}
