import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import compression from 'compression';
import { describeError } from '@marketplace/shared';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);
  const port = Number(configService.get('PORT', 3000));
  const environment = configService.get<string>('NODE_ENV', 'development');

  app.use(helmet());
  app.use(compression());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      validationError: {
        target: false,
        value: false,
      },
    }),
  );

  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', '*'),
    methods: ['GET', 'POST', 'PUT', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Correlation-Id'],
  });

  app.setGlobalPrefix('api/v1');

  if (environment !== 'production') {
    const config = new DocumentBuilder()
      .setTitle('Marketplace Order Engine API')
      .setDescription('Order lifecycle, pricing and courier dispatch for the delivery marketplace')
      .setVersion('1.0.0')
      .addTag('orders', 'Order lifecycle endpoints')
      .addTag('couriers', 'Courier directory endpoints')
      .addTag('health', 'Health checks')
      .addBearerAuth()
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api/docs', app, document, {
      swaggerOptions: {
        persistAuthorization: true,
      },
    });
  }

  // Closes the queue, Kafka producer and database pool through module hooks.
  app.enableShutdownHooks(['SIGTERM', 'SIGINT']);

  await app.listen(port, '0.0.0.0');
  logger.log(`Order engine listening on http://localhost:${port}/api/v1`);
  if (environment !== 'production') {
    logger.log(`API documentation at http://localhost:${port}/api/docs`);
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start order engine: ${describeError(error)}`);
  process.exit(1);
});
