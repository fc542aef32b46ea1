import { NODE_ENV } from './environments';
import { ConfigSourceChain, EnvironmentConfigSource, MapConfigSource } from './sources';
import { ValidationFailedError } from '../observability/errors';
import { LogLevel, parseLogLevel } from '../observability/levels';
import { createDiagnosticsLogger, DiagnosticsLogger } from '../observability/logger';

// =============================================================================
// PROPERTY KEYS
// =============================================================================

export const LOGGING_KEYS = {
  enabled: 'quickpay.logging.enabled',
  level: 'quickpay.logging.level',
  piiMasking: 'quickpay.logging.pii-masking',
  sensitiveFields: 'quickpay.logging.sensitive-fields',
  correlationEnabled: 'quickpay.logging.correlation.enabled',
  headerName: 'quickpay.logging.correlation.header-name',
  generateIfMissing: 'quickpay.logging.correlation.generate-if-missing',
  addToResponse: 'quickpay.logging.correlation.add-to-response',
  serviceName: 'quickpay.logging.service.name',
  serviceVersion: 'quickpay.logging.service.version',
  serviceEnvironment: 'quickpay.logging.service.environment',
  format: 'logging.structured.format',
} as const;

export type RecordFormat = 'ecs' | 'plain';

export const RECORD_FORMATS: readonly RecordFormat[] = ['ecs', 'plain'];

export const DEFAULT_HEADER_NAME = 'X-Transaction-ID';
export const DEFAULT_SERVICE_NAME = 'quickpay-service';

export const LOGGING_DEFAULTS: Readonly<Record<string, string>> = Object.freeze({
  [LOGGING_KEYS.enabled]: 'true',
  [LOGGING_KEYS.level]: 'info',
  [LOGGING_KEYS.piiMasking]: 'true',
  [LOGGING_KEYS.sensitiveFields]: '',
  [LOGGING_KEYS.correlationEnabled]: 'true',
  [LOGGING_KEYS.headerName]: DEFAULT_HEADER_NAME,
  [LOGGING_KEYS.generateIfMissing]: 'true',
  [LOGGING_KEYS.addToResponse]: 'true',
  [LOGGING_KEYS.serviceName]: DEFAULT_SERVICE_NAME,
  [LOGGING_KEYS.serviceVersion]: '1.0.0',
  [LOGGING_KEYS.serviceEnvironment]: NODE_ENV,
  [LOGGING_KEYS.format]: 'ecs',
});

// =============================================================================
// SETTINGS
// =============================================================================

export interface ServiceIdentity {
  name: string;
  version: string;
  environment: string;
}

export interface CorrelationSettings {
  enabled: boolean;
  headerName: string;
  generateIfMissing: boolean;
  addToResponse: boolean;
}

/**
 * Every switch the logging pipeline reads, resolved once from the source chain
 */
export interface LoggingSettings {
  enabled: boolean;
  level: LogLevel;
  format: RecordFormat;
  masking: {
    enabled: boolean;
    additionalFields: string[];
  };
  correlation: CorrelationSettings;
  service: ServiceIdentity;
}

/**
 * Defaults/environment chain used at process start
 */
export const createConfigChain = (env: NodeJS.ProcessEnv = process.env): ConfigSourceChain =>
  new ConfigSourceChain([
    new EnvironmentConfigSource(env),
    new MapConfigSource('defaults', LOGGING_DEFAULTS),
  ]);

/**
 * Strict boolean parse; anything but true/false (any case) is undefined
 */
export const parseBoolean = (value: string | undefined): boolean | undefined => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return undefined;
};

export const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

class SettingsReader {
  constructor(
    private readonly chain: ConfigSourceChain,
    private readonly log: DiagnosticsLogger
  ) {}

  string(key: string): string {
    return this.chain.get(key) ?? LOGGING_DEFAULTS[key];
  }

  boolean(key: string): boolean {
    const raw = this.chain.get(key);
    const parsed = parseBoolean(raw);
    if (parsed !== undefined) {
      return parsed;
    }
    const fallback = parseBoolean(LOGGING_DEFAULTS[key]) ?? false;
    if (raw !== undefined) {
      this.log.warn({ key, value: raw, fallback }, 'Invalid boolean configuration value, using default');
    }
    return fallback;
  }

  level(key: string): LogLevel {
    const raw = this.string(key);
    const parsed = parseLogLevel(raw);
    if (parsed) {
      return parsed;
    }
    this.log.warn({ key, value: raw }, 'Unknown log level, using INFO');
    return LogLevel.INFO;
  }

  format(key: string): RecordFormat {
    const raw = this.string(key).trim().toLowerCase();
    const parsed = RECORD_FORMATS.find((format) => format === raw);
    if (parsed) {
      return parsed;
    }
    this.log.warn({ key, value: raw }, 'Unknown structured log format, using ecs');
    return 'ecs';
  }

  nonBlank(key: string, label: string): string {
    const value = this.string(key).trim();
    if (value.length === 0) {
      throw ValidationFailedError.blank(key, label);
    }
    return value;
  }
}

/**
 * Build the explicit settings struct from the chain. Malformed values fall back
 * to defaults with a diagnostic; a blank header name or service identity is a
 * ValidationFailedError.
 */
export const resolveLoggingSettings = (
  chain: ConfigSourceChain,
  log: DiagnosticsLogger = createDiagnosticsLogger('config')
): LoggingSettings => {
  const read = new SettingsReader(chain, log);

  return {
    enabled: read.boolean(LOGGING_KEYS.enabled),
    level: read.level(LOGGING_KEYS.level),
    format: read.format(LOGGING_KEYS.format),
    masking: {
      enabled: read.boolean(LOGGING_KEYS.piiMasking),
      additionalFields: parseList(chain.get(LOGGING_KEYS.sensitiveFields)),
    },
    correlation: {
      enabled: read.boolean(LOGGING_KEYS.correlationEnabled),
      headerName: read.nonBlank(LOGGING_KEYS.headerName, 'Header name'),
      generateIfMissing: read.boolean(LOGGING_KEYS.generateIfMissing),
      addToResponse: read.boolean(LOGGING_KEYS.addToResponse),
    },
    service: {
      name: read.nonBlank(LOGGING_KEYS.serviceName, 'Service name'),
      version: read.nonBlank(LOGGING_KEYS.serviceVersion, 'Service version'),
      environment: read.nonBlank(LOGGING_KEYS.serviceEnvironment, 'Service environment'),
    },
  };
};
