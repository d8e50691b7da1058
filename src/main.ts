import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AllExceptionsFilter, LoggingInterceptor, logLevelsFor } from '../libs/common';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: logLevelsFor(process.env.LOG_LEVEL ?? 'log'),
  });
  const configService = app.get(ConfigService);

  const port = configService.get<number>('port', 3000);
  const apiPrefix = configService.get<string>('apiPrefix', 'api');

  app.setGlobalPrefix(apiPrefix);
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(new AllExceptionsFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());
  app.enableShutdownHooks();

  const corsOrigin = configService.get<string[] | string>('cors.origin', '*');
  const corsCredentials = configService.get<boolean>('cors.credentials', false);
  app.enableCors({
    origin: corsOrigin,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: corsCredentials,
  });

  await app.listen(port);
  Logger.log(`Footfall analytics listening on port ${port} under /${apiPrefix}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`Bootstrap failed: ${error instanceof Error ? error.stack : String(error)}`, undefined, 'Bootstrap');
  process.exit(1);
});
