import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExchangeApiInterface } from './exchange-api.interface';
import { AggregatedPrices, ClosePrice, PriceQuote } from '../models/market-data';

@Injectable()
export class PriceAggregatorService {
  private readonly logger = new Logger(PriceAggregatorService.name);
  private readonly maxConcurrency: number;

  constructor(
    @Inject(ExchangeApiInterface) private readonly exchangeApi: ExchangeApiInterface,
    private readonly configService: ConfigService,
  ) {
    this.maxConcurrency = this.configService.get<number>('EXCHANGE_MAX_CONCURRENCY', 0);
  }

  /**
   * Fetches the current price and previous close of every symbol concurrently.
   *
   * Results are keyed by symbol, so completion order does not matter. The first
   * failed request rejects the whole call and no partial result is returned.
   * With `EXCHANGE_MAX_CONCURRENCY` set, symbols are requested in consecutive
   * batches of that size instead of all at once.
   */
  async aggregate(symbols: string[]): Promise<AggregatedPrices> {
    const prices = new Map<string, PriceQuote>();
    const closes = new Map<string, ClosePrice>();
    const batchSize = this.maxConcurrency > 0 ? this.maxConcurrency : Math.max(symbols.length, 1);

    for (let i = 0; i < symbols.length; i += batchSize) {
      const batch = symbols.slice(i, i + batchSize);
      const results = await Promise.all(
        batch.map((symbol) =>
          Promise.all([
            this.exchangeApi.getCurrentPrice(symbol),
            this.exchangeApi.getPreviousClose(symbol),
          ]),
        ),
      );

      results.forEach(([quote, close], index) => {
        prices.set(batch[index], quote);
        closes.set(batch[index], close);
      });
    }

    this.logger.debug(`Aggregated prices for ${prices.size} symbols`);
    return { prices, closes };
  }
}
