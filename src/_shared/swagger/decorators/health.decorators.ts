import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Health check',
      description: 'Returns service liveness and order store health',
    }),
    ApiResponse({
      status: 200,
      description: 'Service status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['healthy', 'degraded'],
            example: 'healthy',
          },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
          checks: {
            type: 'object',
            properties: {
              orderStore: { type: 'boolean', example: true },
            },
          },
        },
      },
    }),
  );
};
