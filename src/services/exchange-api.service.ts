import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { ZodType, ZodTypeDef } from 'zod';
import { ExchangeApiInterface } from './exchange-api.interface';
import {
  ClosePrice,
  PriceQuote,
  exchangeInfoSchema,
  klineCloseSchema,
  klinesSchema,
  tickerPriceSchema,
} from '../models/market-data';
import { NetworkError, ParseError, errorMessage } from '../models/price-feed.errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const KLINE_CLOSE_INDEX = 4;

@Injectable()
export class ExchangeApiService implements ExchangeApiInterface {
  private readonly logger = new Logger(ExchangeApiService.name);
  private readonly apiUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeout: number;
  private readonly quoteAsset: string;

  constructor(private readonly configService: ConfigService) {
    this.apiUrl = this.configService
      .get<string>('EXCHANGE_API_URL', 'https://api.binance.us/api/v3')
      .replace(/\/+$/, '');
    this.apiKey = this.configService.get<string>('EXCHANGE_API_KEY');
    this.timeout = this.configService.get<number>('EXCHANGE_TIMEOUT_MS', 10000);
    this.quoteAsset = this.configService.get<string>('QUOTE_ASSET', 'USDT');
  }

  async listQuotePairs(): Promise<string[]> {
    const info = await this.request('/exchangeInfo', {}, exchangeInfoSchema);
    const symbols = info.symbols
      .map(({ symbol }) => symbol)
      .filter((symbol) => symbol.endsWith(this.quoteAsset));

    this.logger.debug(`Found ${symbols.length} ${this.quoteAsset} pairs`);
    return symbols;
  }

  async getCurrentPrice(symbol: string): Promise<PriceQuote> {
    const path = '/ticker/price';
    const ticker = await this.request(path, { symbol }, tickerPriceSchema);
    if (ticker.symbol !== symbol) {
      throw new ParseError(
        `Ticker for ${symbol} answered with symbol ${ticker.symbol}`,
        this.apiUrl + path,
      );
    }
    return { symbol, price: ticker.price };
  }

  async getPreviousClose(symbol: string, now: number = Date.now()): Promise<ClosePrice> {
    const path = '/klines';
    const candles = await this.request(
      path,
      {
        symbol,
        interval: '1d',
        startTime: now - DAY_MS,
        endTime: now,
        limit: 1,
      },
      klinesSchema,
    );

    if (candles.length === 0) {
      return { symbol, close: null };
    }

    const close = klineCloseSchema.safeParse(candles[0][KLINE_CLOSE_INDEX]);
    if (!close.success) {
      throw new ParseError(
        `Unexpected close value in kline for ${symbol}: ${close.error.message}`,
        this.apiUrl + path,
        close.error,
      );
    }
    return { symbol, close: close.data };
  }

  private async request<T>(
    path: string,
    params: Record<string, string | number>,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = this.apiUrl + path;
    let data: unknown;

    try {
      const response = await axios.get<unknown>(url, {
        params,
        headers: this.apiKey ? { 'X-MBX-APIKEY': this.apiKey } : undefined,
        timeout: this.timeout,
      });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new NetworkError(
        `GET ${url} failed${status ? ` with status ${status}` : ''}: ${errorMessage(error)}`,
        url,
        status,
        error,
      );
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ParseError(`Unexpected response from ${url}: ${parsed.error.message}`, url, parsed.error);
    }
    return parsed.data;
  }
}
