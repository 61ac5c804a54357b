import { ClosePrice, PriceQuote } from '../models/market-data';
import { SheetGrid, buildSheetGrid } from './sheet-grid';

export abstract class SheetWriterInterface {
  /** Overwrites the sheet from A1 with the header row and one row per symbol. */
  async write(
    symbols: string[],
    prices: ReadonlyMap<string, PriceQuote>,
    closes: ReadonlyMap<string, ClosePrice>,
    timestamp: string,
  ): Promise<void> {
    await this.writeGrid(buildSheetGrid(symbols, prices, closes, timestamp));
  }

  protected abstract writeGrid(grid: SheetGrid): Promise<void>;
}
