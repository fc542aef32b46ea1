import { LOGGING_KEYS, LOGGING_DEFAULTS, parseBoolean } from './logging';
import { ConfigSourceChain, MapConfigSource } from './sources';
import { describeError } from '../observability/errors';
import { createDiagnosticsLogger, DiagnosticsLogger } from '../observability/logger';

export const LOCKED_SOURCE_NAME = 'quickpay-locked-logging';

export const LOCKED_FORMAT = 'ecs';

export interface EnforcementResult {
  applied: boolean;
  lockedKeys: string[];
  reason?: string;
}

/**
 * Pins the schema format, service identity and masking toggle ahead of every
 * other configuration source at process start, so configuration loaded later
 * cannot shadow them.
 *
 * Values for the service identity and masking toggle are read from the chain at
 * the moment of enforcement; the format is always `ecs`. Once pinned, the values
 * are fixed for the life of the process.
 */
export class ConfigPrecedenceEnforcer {
  constructor(private readonly log: DiagnosticsLogger = createDiagnosticsLogger('config-precedence')) {}

  enforce(chain: ConfigSourceChain): EnforcementResult {
    try {
      const enabled = parseBoolean(chain.get(LOGGING_KEYS.enabled)) ?? true;
      if (!enabled) {
        this.log.info('Structured logging disabled, configuration precedence not enforced');
        return { applied: false, lockedKeys: [], reason: 'logging disabled' };
      }

      const source = new MapConfigSource(LOCKED_SOURCE_NAME, this.lockedValues(chain));
      chain.pin(source);

      this.log.info(
        { source: LOCKED_SOURCE_NAME, keys: source.keys(), order: chain.sourceNames() },
        'Locked logging configuration applied'
      );
      return { applied: true, lockedKeys: source.keys() };
    } catch (error) {
      const reason = describeError(error);
      this.log.warn({ reason }, 'Failed to lock logging configuration, falling back to component defaults');
      return { applied: false, lockedKeys: [], reason };
    }
  }

  private lockedValues(chain: ConfigSourceChain): Record<string, string> {
    const read = (key: string): string => chain.get(key) ?? LOGGING_DEFAULTS[key];
    const masking = parseBoolean(chain.get(LOGGING_KEYS.piiMasking)) ?? true;

    return {
      [LOGGING_KEYS.format]: LOCKED_FORMAT,
      [LOGGING_KEYS.serviceName]: read(LOGGING_KEYS.serviceName),
      [LOGGING_KEYS.serviceVersion]: read(LOGGING_KEYS.serviceVersion),
      [LOGGING_KEYS.serviceEnvironment]: read(LOGGING_KEYS.serviceEnvironment),
      [LOGGING_KEYS.piiMasking]: String(masking),
    };
  }
}
