import { describe, expect, it } from 'vitest';
import { escapeCsvField, formatCsv } from './csv';

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('STL-001')).toBe('STL-001');
    expect(escapeCsvField(12.5)).toBe('12.5');
  });

  it('writes null and undefined as empty fields', () => {
    expect(escapeCsvField(null)).toBe('');
    expect(escapeCsvField(undefined)).toBe('');
  });

  it('quotes separators, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('6" pipe')).toBe('"6"" pipe"');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('formatCsv', () => {
  it('follows the header order', () => {
    const csv = formatCsv(['sku', 'qty'] as const, [
      { qty: 3, sku: 'A' },
      { qty: null, sku: 'B' }
    ]);
    expect(csv).toBe('sku,qty\nA,3\nB,\n');
  });
});
