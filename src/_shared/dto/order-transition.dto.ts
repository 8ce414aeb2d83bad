import { IsEnum, IsNotEmpty } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  BridgeOutcomeStatus,
  OrderStatus,
  ProcessorCommand,
} from '../../core';

/**
 * Status change notification from the commerce platform
 */
export class OrderStatusTransitionDto {
  @ApiProperty({
    description: 'Status before the change',
    enum: OrderStatus,
    example: OrderStatus.ON_HOLD,
  })
  @IsNotEmpty()
  @IsEnum(OrderStatus)
  from!: OrderStatus;

  @ApiProperty({
    description: 'Status after the change',
    enum: OrderStatus,
    example: OrderStatus.PROCESSING,
  })
  @IsNotEmpty()
  @IsEnum(OrderStatus)
  to!: OrderStatus;
}

/**
 * Response DTO for a status change notification
 */
export class BridgeOutcomeDto {
  @ApiProperty({ example: 42 })
  orderId!: number;

  @ApiProperty({
    enum: BridgeOutcomeStatus,
    example: BridgeOutcomeStatus.REQUESTED,
  })
  status!: BridgeOutcomeStatus;

  @ApiPropertyOptional({
    description: 'Processor command sent for this transition',
    enum: ['capture', 'reverse', 'refund'],
  })
  command?: ProcessorCommand;

  @ApiPropertyOptional({
    description: 'Subscriptions cancelled after a refund',
    type: [String],
  })
  cancelledSubscriptions?: string[];
}
