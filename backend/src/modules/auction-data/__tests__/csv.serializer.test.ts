import { describe, it, expect } from 'vitest';
import { escapeCsvCell, serializeRows } from '../storage/csv.serializer.js';
import { HEADER, ROWS, SAMPLE_CSV, csv, rowsOf } from './fixtures.js';

describe('csv.serializer', () => {
  it('should quote only cells that need it', () => {
    expect(escapeCsvCell('Sonata')).toBe('Sonata');
    expect(escapeCsvCell('45,000')).toBe('"45,000"');
    expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvCell('two\nlines')).toBe('"two\nlines"');
  });

  it('should reproduce the parsed CSV', () => {
    expect(serializeRows(HEADER.split(','), rowsOf(SAMPLE_CSV))).toBe(SAMPLE_CSV);
  });

  it('should write rows in rowIndex order whatever order it is given', () => {
    const rows = rowsOf(SAMPLE_CSV).reverse();
    expect(serializeRows(HEADER.split(','), rows)).toBe(SAMPLE_CSV);
  });

  it('should follow the stored column order', () => {
    const rows = rowsOf(csv(ROWS[0]));
    expect(serializeRows(['lane', 'car_number', 'sell_number'], rows)).toBe('lane,car_number,sell_number\nA,12가3456,1001\n');
  });

  it('should emit empty cells for columns a row lacks', () => {
    const rows = rowsOf(csv(ROWS[0]));
    expect(serializeRows(['sell_number', 'vin', 'color'], rows)).toBe('sell_number,vin,color\n1001,,\n');
  });
});
