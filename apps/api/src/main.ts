import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  // ── Routing ───────────────────────────────────────────
  const prefix = configService.get<string>('API_PREFIX', 'api');
  app.setGlobalPrefix(prefix, { exclude: ['health', 'health/ready'] });

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(createValidationPipe());

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>(
    'API_CORS_ORIGIN',
    'http://localhost:3000',
  );
  app.enableCors({
    origin: corsOrigin,
    credentials: true,
  });

  // ── Start ─────────────────────────────────────────────
  const port = Number(configService.get<string>('API_PORT', '4000'));
  await app.listen(port);

  logger.log(`🚀 API running on http://localhost:${port}/${prefix}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
