import { describe, expect, it } from 'vitest';
import { classify, parseStockStatus, statusColor } from './statusClassifier';

describe('classify', () => {
  it('is NORMAL above min * 1.5', () => {
    expect(classify(150, 50)).toBe('NORMAL');
    expect(classify(75.5, 50)).toBe('NORMAL');
  });

  it('is WARNING at or below min * 1.5', () => {
    expect(classify(75, 50)).toBe('WARNING');
    expect(classify(30, 50)).toBe('WARNING');
  });

  it('is CRITICAL at zero whatever the minimum is', () => {
    expect(classify(0, 50)).toBe('CRITICAL');
    expect(classify(0, 0)).toBe('CRITICAL');
  });

  it('treats any positive quantity as NORMAL when the minimum is zero', () => {
    expect(classify(1, 0)).toBe('NORMAL');
  });

  it('honours a custom warning multiplier', () => {
    expect(classify(100, 50, 2)).toBe('WARNING');
    expect(classify(101, 50, 2)).toBe('NORMAL');
  });
});

describe('statusColor', () => {
  it('maps statuses to the legacy color codes', () => {
    expect(statusColor('NORMAL')).toBe('green');
    expect(statusColor('WARNING')).toBe('yellow');
    expect(statusColor('CRITICAL')).toBe('red');
  });
});

describe('parseStockStatus', () => {
  it('accepts status names in any case', () => {
    expect(parseStockStatus('warning')).toBe('WARNING');
    expect(parseStockStatus(' Critical ')).toBe('CRITICAL');
  });

  it('accepts legacy colors', () => {
    expect(parseStockStatus('green')).toBe('NORMAL');
    expect(parseStockStatus('RED')).toBe('CRITICAL');
  });

  it('returns null for anything else', () => {
    expect(parseStockStatus('blue')).toBeNull();
    expect(parseStockStatus('')).toBeNull();
  });
});
