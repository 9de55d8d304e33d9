import 'reflect-metadata';
import {
  Logger,
  RequestMethod,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { validationExceptionFactory } from './common/exceptions/validation.exception';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  // Get ConfigService
  const configService = app.get(ConfigService);

  // Routing: /api/v1/..., health check stays at /health
  app.setGlobalPrefix('api', {
    exclude: [{ path: 'health', method: RequestMethod.GET }],
  });
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: '1',
  });

  // Global pipes
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      exceptionFactory: validationExceptionFactory,
      stopAtFirstError: true,
    }),
  );

  // Global logger
  const isProd =
    configService.get<string>('app.env', 'development') === 'production';
  app.useLogger(
    isProd ? ['error', 'warn'] : ['error', 'warn', 'log', 'debug', 'verbose'],
  );

  // CORS
  app.enableCors({
    origin: configService
      .get<string>('cors.origin', 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim()),
    credentials: true,
  });

  app.enableShutdownHooks();

  const port = configService.get<number>('app.port', 8080);
  await app.listen(port);

  new Logger('Bootstrap').log(
    `Application is running on: http://localhost:${port}`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
