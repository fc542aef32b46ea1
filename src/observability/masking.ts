/**
 * Field names treated as sensitive regardless of configuration
 */
export const DEFAULT_SENSITIVE_FIELDS: readonly string[] = Object.freeze([
  'password',
  'token',
  'secret',
  'key',
  'credential',
  'authorization',
  'card',
  'account',
  'ssn',
  'email',
  'phone',
]);

export const MASK_MARKER = '***';

// values at or below this many characters are hidden completely
const FULL_MASK_LENGTH = 4;
const VISIBLE_EDGE = 2;

export interface MaskingRule {
  readonly sensitiveFieldNames: ReadonlySet<string>;
  readonly enabled: boolean;
}

const normalizeName = (name: string): string => name.trim().toLowerCase();

/**
 * Build a masking rule. Additions are unioned with the defaults, never
 * substituted for them.
 */
export const createMaskingRule = (
  options: { enabled?: boolean; additionalFields?: readonly string[] } = {}
): MaskingRule => {
  const names = new Set(DEFAULT_SENSITIVE_FIELDS);
  for (const field of options.additionalFields ?? []) {
    const normalized = normalizeName(field);
    if (normalized.length > 0) {
      names.add(normalized);
    }
  }
  return Object.freeze({
    sensitiveFieldNames: names,
    enabled: options.enabled ?? true,
  });
};

/**
 * Classifies names as sensitive and partially obfuscates values.
 *
 * Masking keeps the first and last two characters and reveals the length of the
 * value; content in between is replaced by `*`.
 */
export class PiiMaskingEngine {
  private readonly names: readonly string[];

  constructor(private readonly rule: MaskingRule = createMaskingRule()) {
    this.names = [...rule.sensitiveFieldNames];
  }

  get enabled(): boolean {
    return this.rule.enabled;
  }

  get sensitiveFieldNames(): ReadonlySet<string> {
    return this.rule.sensitiveFieldNames;
  }

  /**
   * Case-insensitive exact or substring match against the sensitive names
   */
  classify(fieldName: string | null | undefined): boolean {
    if (fieldName === null || fieldName === undefined) {
      return false;
    }
    const normalized = normalizeName(fieldName);
    if (normalized.length === 0) {
      return false;
    }
    return this.names.some((name) => normalized.includes(name));
  }

  mask(value: string | null | undefined): string {
    if (value === null || value === undefined) {
      return MASK_MARKER;
    }
    if (!this.rule.enabled) {
      return value;
    }

    // code points, so a surrogate pair is never split
    const chars = Array.from(value);
    if (chars.length <= FULL_MASK_LENGTH) {
      return MASK_MARKER;
    }

    return (
      chars.slice(0, VISIBLE_EDGE).join('') +
      '*'.repeat(chars.length - FULL_MASK_LENGTH) +
      chars.slice(-VISIBLE_EDGE).join('')
    );
  }

  maskIfSensitive(fieldName: string | null | undefined, value: string | null | undefined): string {
    if (value === null || value === undefined) {
      return MASK_MARKER;
    }
    if (!this.rule.enabled || !this.classify(fieldName)) {
      return value;
    }
    return this.mask(value);
  }
}
