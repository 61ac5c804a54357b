import { ClosePrice, PriceQuote } from '../models/market-data';

export const SHEET_HEADER = ['Symbol', 'Current Price', 'Last Close Price', 'Updated At'] as const;
export const NOT_AVAILABLE = 'N/A';

export type SheetCell = string | number;
export type SheetRow = [symbol: string, price: SheetCell, close: SheetCell, updatedAt: string];
export type SheetGrid = SheetCell[][];

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function buildSheetGrid(
  symbols: string[],
  prices: ReadonlyMap<string, PriceQuote>,
  closes: ReadonlyMap<string, ClosePrice>,
  timestamp: string,
): SheetGrid {
  const rows = symbols.map((symbol): SheetRow => [
    symbol,
    prices.get(symbol)?.price ?? NOT_AVAILABLE,
    closes.get(symbol)?.close ?? NOT_AVAILABLE,
    timestamp,
  ]);
  return [[...SHEET_HEADER], ...rows];
}
