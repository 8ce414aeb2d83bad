import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { rawBody: true });

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Checkout Reconciler')
    .setDescription(
      'Applies signed hosted-checkout payment notifications to orders and turns merchant status changes into capture, cancel and refund requests.',
    )
    .setVersion('0.1.0')
    .addTag('Ingest', 'Receive processor payment notifications')
    .addTag('Checkout', 'Hosted checkout sessions and shopper return')
    .addTag('Orders', 'Merchant order status changes')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 4010;
  await app.listen(port);
  logger.log(`Checkout reconciler is running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  logger.error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
