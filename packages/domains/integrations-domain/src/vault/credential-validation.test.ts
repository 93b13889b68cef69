import { describe, expect, it } from 'vitest';
import { TrendyolCredentialsSchema } from '../connectors/trendyol.js';
import { isPlaceholder, validateCredentials } from './credential-validation.js';

describe('validateCredentials', () => {
  it('accepts a complete credential set', () => {
    expect(
      validateCredentials(TrendyolCredentialsSchema, { apiKey: 'test-key', apiSecret: 'test-secret', supplierId: 1 }),
    ).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('reports missing fields by path', () => {
    const result = validateCredentials(TrendyolCredentialsSchema, { apiKey: 'test-key', supplierId: 1 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['apiSecret: Required']);
  });

  it('rejects sample-config placeholders', () => {
    const result = validateCredentials(TrendyolCredentialsSchema, {
      apiKey: 'YOUR_API_KEY',
      apiSecret: 'test-secret',
      supplierId: 1,
    });
    expect(result).toEqual({ valid: false, errors: ['apiKey: looks like a placeholder value'], warnings: [] });
  });

  it('warns about surrounding whitespace', () => {
    const result = validateCredentials(TrendyolCredentialsSchema, {
      apiKey: 'test-key ',
      apiSecret: 'test-secret',
      supplierId: 1,
    });
    expect(result).toEqual({ valid: true, errors: [], warnings: ['apiKey: has surrounding whitespace'] });
  });
});

describe('isPlaceholder', () => {
  it.each(['YOUR_SECRET', 'changeme', 'xxxx', '<api-key>', 'test', ' placeholder '])('flags %s', (value) => {
    expect(isPlaceholder(value)).toBe(true);
  });

  it.each(['test-secret', 'sk_example_value', 'x'])('allows %s', (value) => {
    expect(isPlaceholder(value)).toBe(false);
  });
});
