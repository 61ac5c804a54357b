import { z } from 'zod';

export interface PriceQuote {
  symbol: string;
  price: number;
}

export interface ClosePrice {
  symbol: string;
  /** `null` when the exchange has no daily candle for the last 24h. */
  close: number | null;
}

export interface AggregatedPrices {
  prices: Map<string, PriceQuote>;
  closes: Map<string, ClosePrice>;
}

export interface CycleReport {
  symbols: number;
  updatedAt: string;
}

// Prices arrive as decimal strings ("70000.50000000").
const decimal = z
  .union([z.string().regex(/^-?\d+(\.\d+)?$/), z.number()])
  .pipe(z.coerce.number().finite());

export const exchangeInfoSchema = z.object({
  symbols: z.array(z.object({ symbol: z.string() })),
});

export const tickerPriceSchema = z.object({
  symbol: z.string(),
  price: decimal,
});

// [openTime, open, high, low, close, volume, closeTime, ...]
export const klinesSchema = z.array(z.array(z.union([z.string(), z.number()])).min(5));

export const klineCloseSchema = decimal;
