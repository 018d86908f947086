/**
 * Text helper Tests
 */

import { TRUNCATION_MARKER } from '@risk-router/shared/types';
import { toText, truncateText, truncateValue } from './text';

describe('truncateText', () => {
  it('leaves text at the limit untouched', () => {
    const text = 'a'.repeat(50000);
    expect(truncateText(text)).toBe(text);
  });

  it('keeps the first 50,000 characters and appends the marker', () => {
    const text = `${'a'.repeat(50000)}${'b'.repeat(10000)}`;

    const result = truncateText(text);

    expect(result.length).toBe(50000 + TRUNCATION_MARKER.length);
    expect(result.endsWith(`a${TRUNCATION_MARKER}`)).toBe(true);
    expect(result).not.toContain('b');
  });

  it('honours a custom limit', () => {
    expect(truncateText('abcdef', 3)).toBe('abc... [TRUNCATED]');
  });
});

describe('toText / truncateValue', () => {
  it('serialises objects as JSON', () => {
    expect(toText({ a: 1 })).toBe('{"a":1}');
    expect(toText('plain')).toBe('plain');
  });

  it('maps absent values to null', () => {
    expect(truncateValue(undefined)).toBeNull();
    expect(truncateValue(null)).toBeNull();
  });
});
