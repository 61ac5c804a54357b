import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { SheetUpdateService } from './services/sheet-update.service';
import { errorMessage } from './models/price-feed.errors';

async function bootstrap() {
  const logger = new Logger('Main');
  logger.log('Starting Price Sheet Tracker...');

  try {
    const app = await NestFactory.create(AppModule);
    app.enableShutdownHooks();

    const port = app.get(ConfigService).get<number>('PORT', 8080);
    await app.listen(port);
    logger.log(`Status server is running on port ${port}`);

    try {
      await app.get(SheetUpdateService).start();
    } catch (error) {
      logger.error(`Sheet updates stopped: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
      await app.close();
      process.exit(1);
    }
  } catch (error) {
    logger.error(`Application failed to start: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    process.exit(1); // Ensure the process exits on failure
  }
}

void bootstrap();
