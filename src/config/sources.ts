import { ConfigurationError } from '../observability/errors';

/**
 * One layer of configuration. Keys are dotted, lower-case property names such as
 * `quickpay.logging.correlation.header-name`.
 */
export interface ConfigSource {
  readonly name: string;
  get(key: string): string | undefined;
}

/**
 * Fixed key/value layer (defaults, overrides, the locked layer)
 */
export class MapConfigSource implements ConfigSource {
  private readonly values: ReadonlyMap<string, string>;

  constructor(
    readonly name: string,
    values: Readonly<Record<string, string>>
  ) {
    this.values = new Map(Object.entries(values));
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }
}

/**
 * Relaxed binding from a property key to its environment variable name:
 * `quickpay.logging.pii-masking` → `QUICKPAY_LOGGING_PII_MASKING`
 */
export const toEnvironmentKey = (key: string): string => key.replace(/[.-]/g, '_').toUpperCase();

/**
 * Reads properties from process environment variables
 */
export class EnvironmentConfigSource implements ConfigSource {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    readonly name: string = 'environment'
  ) {}

  get(key: string): string | undefined {
    const value = this.env[toEnvironmentKey(key)];
    return value === undefined || value.trim().length === 0 ? undefined : value;
  }
}

/**
 * Ordered list of configuration sources; the first source holding a key wins.
 *
 * A single source may be pinned ahead of the list. Sources added afterwards, even
 * with `addFirst`, rank below it, and the pinned source cannot be replaced.
 */
export class ConfigSourceChain {
  private pinned?: ConfigSource;
  private readonly sources: ConfigSource[];

  constructor(sources: readonly ConfigSource[] = []) {
    this.sources = [...sources];
  }

  addFirst(source: ConfigSource): this {
    this.assertUniqueName(source.name);
    this.sources.unshift(source);
    return this;
  }

  addLast(source: ConfigSource): this {
    this.assertUniqueName(source.name);
    this.sources.push(source);
    return this;
  }

  pin(source: ConfigSource): void {
    if (this.pinned) {
      throw new ConfigurationError(`Configuration source '${this.pinned.name}' is already pinned`);
    }
    this.assertUniqueName(source.name);
    this.pinned = source;
  }

  get(key: string): string | undefined {
    for (const source of this.ordered()) {
      const value = source.get(key);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  /**
   * Name of the source that supplies `key`, for startup diagnostics
   */
  origin(key: string): string | undefined {
    return this.ordered().find((source) => source.get(key) !== undefined)?.name;
  }

  sourceNames(): string[] {
    return this.ordered().map((source) => source.name);
  }

  private ordered(): ConfigSource[] {
    return this.pinned ? [this.pinned, ...this.sources] : this.sources;
  }

  private assertUniqueName(name: string): void {
    if (this.ordered().some((source) => source.name === name)) {
      throw new ConfigurationError(`Configuration source '${name}' is already registered`);
    }
  }
}
