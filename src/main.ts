import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { createValidationPipe } from './shared/validation/validation.pipe';

/**
 * Validate required environment variables at startup
 */
function validateEnvironment(): void {
  const logger = new Logger('Environment');
  const requiredVars = ['DATABASE_URL'];

  const missing = requiredVars.filter((varName) => !process.env[varName]);

  if (missing.length > 0) {
    logger.error(
      `Missing required environment variables: ${missing.join(', ')}`,
    );
    process.exit(1);
  }

  logger.log(
    `Environment variables validated. Running in ${process.env.NODE_ENV ?? 'development'} mode.`,
  );
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(createValidationPipe());

  // Shutdown hooks stop the consumer, drain workers, then close connections
  app.enableShutdownHooks();

  // Swagger setup
  const config = new DocumentBuilder()
    .setTitle('Notification Service')
    .setDescription(
      'Dispatches email and SMS notifications for order, payment and shipping events',
    )
    .setVersion('1.0')
    .addTag('notifications', 'Manual sends and job lookup')
    .addTag('health', 'Readiness and liveness checks')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = parseInt(process.env.PORT || '3000', 10);
  const logger = new Logger('Bootstrap');

  await app.listen(port, '0.0.0.0');

  logger.log(`Notification service running on http://localhost:${port}`);
  logger.log(`Swagger docs at http://localhost:${port}/docs`);
}

validateEnvironment();
bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Startup failed: ${error instanceof Error ? error.message : error}`,
  );
  process.exit(1);
});
