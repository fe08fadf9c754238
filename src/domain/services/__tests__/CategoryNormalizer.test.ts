import { describe, expect, it } from 'vitest';
import { categoryContains, normalizeCategory } from '../CategoryNormalizer.js';

describe('normalizeCategory', () => {
  it('should keep array categories, dropping blank members', () => {
    expect(normalizeCategory(['Service', '', 'Subscription'])).toEqual(['Service', 'Subscription']);
  });

  it('should parse JSON-encoded arrays', () => {
    expect(normalizeCategory('["Transfer", "Payroll"]')).toEqual(['Transfer', 'Payroll']);
  });

  it('should wrap legacy single strings', () => {
    expect(normalizeCategory('  Food and Drink ')).toEqual(['Food and Drink']);
  });

  it('should keep a malformed bracketed string as one category', () => {
    expect(normalizeCategory('[Travel')).toEqual(['[Travel']);
  });

  it('should fall back to Uncategorized for empty or non-string input', () => {
    expect(normalizeCategory(null)).toEqual(['Uncategorized']);
    expect(normalizeCategory('')).toEqual(['Uncategorized']);
    expect(normalizeCategory([])).toEqual(['Uncategorized']);
    expect(normalizeCategory(42)).toEqual(['Uncategorized']);
  });
});

describe('category helpers', () => {
  it('should match keywords case-insensitively', () => {
    expect(categoryContains(['Transfer', 'Payroll'], 'payroll')).toBe(true);
    expect(categoryContains(['Shops'], 'payroll')).toBe(false);
  });
});
