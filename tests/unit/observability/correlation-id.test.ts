/**
 * Unit tests for correlation id generation and format checks
 */

import {
  correlationIdTimestamp,
  generateCorrelationId,
  InvalidArgumentError,
  isValidCorrelationIdFormat,
} from '../../../src/observability';

describe('generateCorrelationId', () => {
  it('should use the txn prefix by default', () => {
    const id = generateCorrelationId();

    expect(id).toMatch(/^txn_\d+_[A-Za-z0-9_-]+$/);
    expect(isValidCorrelationIdFormat(id)).toBe(true);
  });

  it('should produce the custom prefix format', () => {
    const id = generateCorrelationId('evt');

    expect(id).toMatch(/^evt_\d+_[A-Za-z0-9_-]+$/);
  });

  it('should embed the current time', () => {
    const before = Date.now();
    const id = generateCorrelationId();
    const after = Date.now();

    const timestamp = correlationIdTimestamp(id);
    expect(timestamp).toBeGreaterThanOrEqual(before);
    expect(timestamp).toBeLessThanOrEqual(after);
  });

  it('should encode 12 random bytes as 16 base64url characters', () => {
    const id = generateCorrelationId('evt');
    const random = id.slice('evt_'.length).replace(/^\d+_/, '');

    expect(random).toHaveLength(16);
  });

  it('should not repeat over 10,000 ids', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 10_000; i++) {
      ids.add(generateCorrelationId());
    }

    expect(ids.size).toBe(10_000);
  });

  it.each(['', '   '])('should reject blank prefix %j', (prefix) => {
    expect(() => generateCorrelationId(prefix)).toThrow(InvalidArgumentError);
  });

  it('should reject a prefix containing an underscore', () => {
    expect(() => generateCorrelationId('my_prefix')).toThrow("Correlation id prefix cannot contain '_': my_prefix");
  });
});

describe('isValidCorrelationIdFormat', () => {
  it('should accept a well-formed id', () => {
    expect(isValidCorrelationIdFormat('txn_1700000000000_abc123')).toBe(true);
  });

  it('should accept underscores inside the random segment', () => {
    expect(isValidCorrelationIdFormat('txn_1700000000000_ab_c-1')).toBe(true);
  });

  it.each([
    ['undefined', undefined],
    ['null', null],
    ['empty', ''],
    ['blank', '   '],
    ['no separators', 'txn1700000000000'],
    ['missing random segment', 'txn_1700000000000'],
    ['empty random segment', 'txn_1700000000000_'],
    ['empty prefix', '_1700000000000_abc'],
    ['non-numeric timestamp', 'txn_17000x0000000_abc'],
    ['empty timestamp', 'txn__abc'],
  ])('should reject %s', (_label, id) => {
    expect(isValidCorrelationIdFormat(id)).toBe(false);
  });
});

describe('correlationIdTimestamp', () => {
  it('should read the millisecond segment', () => {
    expect(correlationIdTimestamp('txn_1700000000000_abc123')).toBe(1700000000000);
  });

  it('should return undefined for a malformed id', () => {
    expect(correlationIdTimestamp('not-an-id')).toBeUndefined();
  });
});
