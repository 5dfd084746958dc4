import { describe, it, expect } from 'vitest';
import { ParseError } from '../../../common/errors.js';
import { fieldForHeader, parseAuctionCsv } from '../ingest/csv_record.parser.js';
import { HEADER, ROWS, SAMPLE_CSV, csv } from './fixtures.js';

describe('CsvRecordParser', () => {
  it('should map columns by header name and keep order', () => {
    const parsed = parseAuctionCsv(SAMPLE_CSV);

    expect(parsed.rowCount).toBe(3);
    expect(parsed.warnings).toEqual([]);
    expect(parsed.columns).toEqual(HEADER.split(','));
    expect(parsed.rows.map((r) => r.sellNumber)).toEqual(['1001', '1002', '1003']);
    expect(parsed.rows.map((r) => r.rowIndex)).toEqual([0, 1, 2]);

    const first = parsed.rows[0];
    expect(first.carNumber).toBe('12가3456');
    expect(first.title).toBe('Sonata DN8');
    expect(first.km).toBe('45,000');
    expect(first.vin).toBe('');
    expect(first.extra).toEqual({ lane: 'A' });
  });

  it('should unescape quoted cells', () => {
    const parsed = parseAuctionCsv(SAMPLE_CSV);
    expect(parsed.rows[2].title).toBe('Grandeur "Le Blanc"');
  });

  it('should not care about upstream column order', () => {
    const parsed = parseAuctionCsv('car_number,Post Title,sell_number\n11가1111,Morning,7\n');
    expect(parsed.rows[0]).toMatchObject({ sellNumber: '7', carNumber: '11가1111', postTitle: 'Morning' });
  });

  it('should match headers case-insensitively', () => {
    expect(fieldForHeader('  POST TITLE ')).toBe('postTitle');
    expect(fieldForHeader('Sell_Number')).toBe('sellNumber');
    expect(fieldForHeader('lane')).toBeUndefined();
  });

  it('should skip malformed rows with warnings and keep the rest in order', () => {
    const text = csv(
      ROWS[0],
      '1009,99가9999,Too,Few',
      'abc,77가7777,Bad number,2018,1,1,C',
      ROWS[1],
      '1010,,No car,2018,1,1,C',
      ROWS[2]
    );
    const parsed = parseAuctionCsv(text);

    expect(parsed.rowCount).toBe(3);
    expect(parsed.rows.map((r) => r.sellNumber)).toEqual(['1001', '1002', '1003']);
    expect(parsed.rows.map((r) => r.rowIndex)).toEqual([0, 3, 5]);
    expect(parsed.warnings).toEqual([
      { rowIndex: 1, reason: 'expected 7 columns, got 4' },
      { rowIndex: 2, reason: 'sell_number "abc" is not a number' },
      { rowIndex: 4, reason: 'car_number is empty' },
    ]);
  });

  it('should accept sell numbers with thousands separators', () => {
    const parsed = parseAuctionCsv('sell_number,car_number\n"1,204",12가0001\n');
    expect(parsed.rows[0].sellNumber).toBe('1,204');
  });

  it('should strip a UTF-8 BOM from the header', () => {
    const parsed = parseAuctionCsv('\uFEFFsell_number,car_number\n1,12가0001\n');
    expect(parsed.columns).toEqual(['sell_number', 'car_number']);
    expect(parsed.rowCount).toBe(1);
  });

  it('should return zero rows, not throw, when every data row is malformed', () => {
    const parsed = parseAuctionCsv('sell_number,car_number\nx,1\ny,2\n');
    expect(parsed.rowCount).toBe(0);
    expect(parsed.warnings).toHaveLength(2);
  });

  it('should throw ParseError for empty input', () => {
    expect(() => parseAuctionCsv('')).toThrow(ParseError);
  });

  it('should throw ParseError when a required column is missing', () => {
    expect(() => parseAuctionCsv('sell_number,title\n1,x\n')).toThrow(
      'CSV header is missing required column(s): car_number'
    );
  });

  it('should throw ParseError on duplicate headers', () => {
    expect(() => parseAuctionCsv('sell_number,car_number,Title,title\n1,2,3,4\n')).toThrow(
      'CSV header repeats column "title"'
    );
  });

  it('should skip a row with a stray quote and keep the rows around it', () => {
    const parsed = parseAuctionCsv(csv(ROWS[0], '1004,78라1234,Bad"quote,2018,1,1,C', ROWS[1]));

    expect(parsed.rowCount).toBe(2);
    expect(parsed.rows.map((r) => [r.rowIndex, r.sellNumber])).toEqual([
      [0, '1001'],
      [2, '1002'],
    ]);
    expect(parsed.warnings).toHaveLength(1);
    expect(parsed.warnings[0].rowIndex).toBe(1);
    expect(parsed.warnings[0].reason).toMatch(/^malformed CSV: Invalid Opening Quote/);
  });

  it('should order unreadable and unmappable rows together in the warnings', () => {
    const parsed = parseAuctionCsv(csv('1009,99가9999,Too,Few', 'x"y,1,t,2018,1,1,A', ROWS[2]));

    expect(parsed.rows.map((r) => r.rowIndex)).toEqual([2]);
    expect(parsed.warnings.map((w) => w.rowIndex)).toEqual([0, 1]);
  });

  it('should report an unterminated quote as a warning for its row', () => {
    const parsed = parseAuctionCsv('sell_number,car_number\n1,12가0001\n2,"unterminated\n');

    expect(parsed.rows.map((r) => r.sellNumber)).toEqual(['1']);
    expect(parsed.warnings.map((w) => w.rowIndex)).toEqual([1]);
  });

  it('should throw ParseError when the header itself cannot be read', () => {
    expect(() => parseAuctionCsv('sell"number,car_number\n1,12가0001\n')).toThrow(/^CSV header is malformed/);
  });
});
