import { describe, it, expect } from 'vitest';
import { parseCsv, parseTimestamp } from '../../src/data/CsvLoader';
import { InvalidSeriesError, MissingColumnError } from '../../src/core/errors';

const JAN_1 = 1704067200000;
const JAN_2 = JAN_1 + 24 * 60 * 60 * 1000;

describe('parseCsv', () => {
  it('reads ISO timestamps and orders rows by time', async () => {
    const series = await parseCsv(
      [
        'Timestamp,Open,High,Low,Close,Volume',
        '2024-01-02T00:00:00Z,11,12,10,11.5,200',
        '2024-01-01T00:00:00Z,10,11,9,10.5,100',
      ].join('\n')
    );

    expect(series.columns).toEqual(['timestamp', 'open', 'high', 'low', 'close', 'volume']);
    expect(series.bars).toEqual([
      { timestamp: JAN_1, open: 10, high: 11, low: 9, close: 10.5, volume: 100 },
      { timestamp: JAN_2, open: 11, high: 12, low: 10, close: 11.5, volume: 200 },
    ]);
  });

  it('accepts epoch millisecond timestamps', async () => {
    const series = await parseCsv(`timestamp,open,high,low,close,volume\n${JAN_1},1,2,0.5,1.5,10\n`);
    expect(series.bars[0].timestamp).toBe(JAN_1);
  });

  it('keeps extra numeric columns, with blank cells as NaN', async () => {
    const series = await parseCsv(
      [
        'timestamp,open,high,low,close,volume,signal_strength',
        `${JAN_1},1,2,0.5,1.5,10,`,
        `${JAN_2},1,2,0.5,1.5,10,0.8`,
      ].join('\n')
    );

    expect(series.columns).toContain('signal_strength');
    expect(series.bars[0].signal_strength).toBeNaN();
    expect(series.bars[1].signal_strength).toBe(0.8);
  });

  it('returns an empty series for empty content', async () => {
    const series = await parseCsv('');
    expect(series.bars).toEqual([]);
    expect(series.columns).toEqual(['timestamp', 'open', 'high', 'low', 'close', 'volume']);
  });

  it('raises MissingColumnError naming the absent columns', async () => {
    const promise = parseCsv(`timestamp,open,high,low,close\n${JAN_1},1,2,0.5,1.5\n`);

    await expect(promise).rejects.toBeInstanceOf(MissingColumnError);
    await expect(promise).rejects.toMatchObject({ missingColumns: ['volume'] });
  });

  it('rejects duplicate timestamps', async () => {
    const content = `timestamp,open,high,low,close,volume\n${JAN_1},1,2,0.5,1.5,10\n${JAN_1},1,2,0.5,1.5,10\n`;
    await expect(parseCsv(content)).rejects.toBeInstanceOf(InvalidSeriesError);
  });

  it('rejects an unreadable timestamp with its row number', async () => {
    const content = 'timestamp,open,high,low,close,volume\nyesterday,1,2,0.5,1.5,10\n';
    await expect(parseCsv(content)).rejects.toThrow("Row 1 has an unreadable timestamp 'yesterday'");
  });

  it('rejects a non-numeric price', async () => {
    const content = `timestamp,open,high,low,close,volume\n${JAN_1},1,2,0.5,n/a,10\n`;
    await expect(parseCsv(content)).rejects.toThrow("Bar 0 has a non-numeric 'close' value");
  });
});

describe('parseTimestamp', () => {
  it('treats digit strings as epoch milliseconds', () => {
    expect(parseTimestamp('1700000000000')).toBe(1700000000000);
  });

  it('parses ISO dates', () => {
    expect(parseTimestamp('2024-01-01T00:00:00Z')).toBe(JAN_1);
  });

  it('returns NaN for text it cannot read', () => {
    expect(parseTimestamp('soon')).toBeNaN();
  });
});
