import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validate } from './config/env.validation';
import { StatusController } from './controllers/status.controller';
import { ExchangeApiInterface } from './services/exchange-api.interface';
import { ExchangeApiService } from './services/exchange-api.service';
import { PriceAggregatorService } from './services/price-aggregator.service';
import { SheetUpdateService } from './services/sheet-update.service';
import { SheetWriterInterface } from './sheets/sheet-writer.interface';
import { GoogleSheetWriterService } from './sheets/google-sheet-writer.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true, // Make environment variables globally available
      envFilePath: '.env', // Load variables from .env file
      validate,
    }),
  ],
  controllers: [StatusController],
  providers: [
    SheetUpdateService,
    PriceAggregatorService,
    {
      provide: ExchangeApiInterface,
      useClass: ExchangeApiService,
    },
    {
      provide: SheetWriterInterface,
      useClass: GoogleSheetWriterService,
    },
  ],
})
export class AppModule {}
