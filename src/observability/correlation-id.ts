import { randomBytes } from 'crypto';

import { InvalidArgumentError } from './errors';

export const DEFAULT_CORRELATION_PREFIX = 'txn';

// 96 bits, encodes to 16 base64url characters
const RANDOM_BYTES = 12;

const TIMESTAMP_PATTERN = /^\d+$/;

/**
 * Generate a sortable, unique correlation id of the form
 * `<prefix>_<epochMillis>_<random>`.
 *
 * The random segment is base64url without padding, so it may itself contain `_`;
 * the format is read by splitting on the first two underscores only.
 */
export const generateCorrelationId = (prefix: string = DEFAULT_CORRELATION_PREFIX): string => {
  if (prefix.trim().length === 0) {
    throw new InvalidArgumentError('Correlation id prefix cannot be empty');
  }
  if (prefix.includes('_')) {
    throw new InvalidArgumentError(`Correlation id prefix cannot contain '_': ${prefix}`);
  }

  const timestamp = Date.now();
  const random = randomBytes(RANDOM_BYTES).toString('base64url');

  return `${prefix}_${timestamp}_${random}`;
};

/**
 * Check the three-part shape of a correlation id. Does not verify where the
 * random segment came from.
 */
export const isValidCorrelationIdFormat = (id: string | null | undefined): boolean => {
  if (!id || id.trim().length === 0) {
    return false;
  }

  const first = id.indexOf('_');
  if (first <= 0) {
    return false;
  }
  const second = id.indexOf('_', first + 1);
  if (second < 0) {
    return false;
  }

  const timestamp = id.slice(first + 1, second);
  const random = id.slice(second + 1);

  if (!TIMESTAMP_PATTERN.test(timestamp) || !Number.isSafeInteger(Number(timestamp))) {
    return false;
  }

  return random.length > 0;
};

/**
 * Epoch milliseconds embedded in a well-formed correlation id
 */
export const correlationIdTimestamp = (id: string): number | undefined => {
  if (!isValidCorrelationIdFormat(id)) {
    return undefined;
  }
  const first = id.indexOf('_');
  return Number(id.slice(first + 1, id.indexOf('_', first + 1)));
};
