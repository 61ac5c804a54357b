import { buildSheetGrid, formatUtcTimestamp, NOT_AVAILABLE, SHEET_HEADER } from '../../src/sheets/sheet-grid';
import { ClosePrice, PriceQuote } from '../../src/models/market-data';

const TS = '2024-03-09 07:05:03';

function quotes(entries: Array<[string, number]>): Map<string, PriceQuote> {
  return new Map<string, PriceQuote>(entries.map(([symbol, price]) => [symbol, { symbol, price }]));
}

function closes(entries: Array<[string, number | null]>): Map<string, ClosePrice> {
  return new Map<string, ClosePrice>(entries.map(([symbol, close]) => [symbol, { symbol, close }]));
}

describe('formatUtcTimestamp', () => {
  it('formats in UTC without the ISO separator or milliseconds', () => {
    expect(formatUtcTimestamp(new Date(Date.UTC(2024, 2, 9, 7, 5, 3, 456)))).toBe(TS);
  });
});

describe('buildSheetGrid', () => {
  it('renders the header and one row per symbol in fetched order', () => {
    const grid = buildSheetGrid(
      ['BTCUSDT', 'ETHUSDT'],
      quotes([['ETHUSDT', 3500.25], ['BTCUSDT', 70000.5]]),
      closes([['ETHUSDT', null], ['BTCUSDT', 69000.0]]),
      TS,
    );

    expect(grid).toEqual([
      ['Symbol', 'Current Price', 'Last Close Price', 'Updated At'],
      ['BTCUSDT', 70000.5, 69000, TS],
      ['ETHUSDT', 3500.25, 'N/A', TS],
    ]);
  });

  it('writes only the header when there are no symbols', () => {
    expect(buildSheetGrid([], new Map(), new Map(), TS)).toEqual([[...SHEET_HEADER]]);
  });

  it('uses the sentinel for a missing close and keeps a real zero', () => {
    const grid = buildSheetGrid(
      ['AUSDT', 'BUSDT'],
      quotes([['AUSDT', 1], ['BUSDT', 2]]),
      closes([['AUSDT', null], ['BUSDT', 0]]),
      TS,
    );

    expect(grid).toHaveLength(3);
    expect(grid[1][2]).toBe(NOT_AVAILABLE);
    expect(grid[2][2]).toBe(0);
  });
});
