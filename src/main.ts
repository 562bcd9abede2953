import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { createValidationPipe } from './common/pipes/validation.pipe';
import { resolveLogLevels } from './common/utils/log-levels';

/**
 * Bootstrap function to initialize and start the NestJS application
 *
 * Configures:
 * - Security headers via helmet
 * - Response compression
 * - CORS restricted to ALLOWED_ORIGINS
 * - Global validation, logging and error rendering
 * - Swagger API documentation at /docs
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  app.useLogger(resolveLogLevels(configService.get<string>('app.logLevel')));

  // Security headers
  app.use(helmet());

  // Response compression
  app.use(compression());

  app.enableCors({
    origin: configService.get<string[]>('app.allowedOrigins'),
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    exposedHeaders: ['Retry-After'],
  });

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalInterceptors(new LoggingInterceptor());
  app.useGlobalFilters(
    new AllExceptionsFilter(configService.get<string>('app.env') === 'development'),
  );

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Rider Auth API')
    .setDescription('Registration, login and role-checked access for rider accounts')
    .setVersion(configService.get<string>('app.version') ?? '1.0.0')
    .addBearerAuth()
    .addTag('auth', 'Registration and login')
    .addTag('users', 'Authenticated user endpoints')
    .addTag('health', 'Liveness')
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
    },
  });

  app.enableShutdownHooks();

  const port = configService.get<number>('app.port') ?? 3000;
  await app.listen(port);

  logger.log(`Application running on: http://localhost:${port}`);
  logger.log(`Swagger documentation: http://localhost:${port}/docs`);
  logger.log(`Health check: http://localhost:${port}/health`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Application failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
