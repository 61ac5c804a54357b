import { ClosePrice, PriceQuote } from '../models/market-data';

export abstract class ExchangeApiInterface {
  abstract listQuotePairs(): Promise<string[]>;
  abstract getCurrentPrice(symbol: string): Promise<PriceQuote>;
  abstract getPreviousClose(symbol: string): Promise<ClosePrice>;
}
