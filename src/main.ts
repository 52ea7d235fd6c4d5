import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConsoleLogger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { AppConfigService } from './config/app.config';

async function bootstrap() {
  const logger = new ConsoleLogger();
  logger.log('Starting application initialization...');

  // Nest's default body parsers cover JSON and the gateway's form-encoded notifications
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { logger });

  const port = app.get(AppConfigService).getPort();

  // Graceful shutdown handler
  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;

    logger.log(`Shutting down (${signal})...`);

    try {
      await app.close();
      logger.log('HTTP server closed successfully');
    } catch (error) {
      logger.error('Error closing HTTP server:', error);
    }

    logger.log('Shutdown complete');
    process.exit(0);
  };

  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await app.listen(port);
  logger.log(`Application listening on port ${port}`);
}

bootstrap().catch((error) => {
  console.error('[ERROR] Error starting application:', error);
  process.exit(1);
});
