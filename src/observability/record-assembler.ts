import type { RecordFormat, ServiceIdentity } from '../config/logging';
import { AmbientMetadata, CORRELATION_ID_KEY, SERVICE_ID_KEY, USER_ID_KEY } from './context-store';
import { describeError, SerializationDegradedError } from './errors';
import { currentThreadName, getHostIdentity, HostIdentity } from './host-identity';
import { LogLevel } from './levels';
import { createDiagnosticsLogger, DiagnosticsLogger } from './logger';
import { PiiMaskingEngine } from './masking';

/**
 * Canonical record, one per log call. Keys are declared in wire order; optional
 * groups are either fully populated or absent.
 */
export interface StructuredLogRecord {
  timestamp: string;
  host: { name: string; ip: string };
  process: { pid: number; threadName: string };
  log: { level: LogLevel; loggerName: string };
  service: ServiceIdentity;
  correlation?: { id: string };
  user?: { id: string };
  message: string;
  labels?: Record<string, string>;
  error?: { type: string; message: string; stackTrace: string };
}

export interface RecordAssemblerOptions {
  masking: PiiMaskingEngine;
  service: ServiceIdentity;
  format?: RecordFormat;
  host?: HostIdentity;
  clock?: () => Date;
  diagnostics?: DiagnosticsLogger;
}

const PLACEHOLDER = /\{\}/g;

const countPlaceholders = (template: string): number => template.match(PLACEHOLDER)?.length ?? 0;

const interpolate = (template: string, values: readonly string[]): string => {
  let index = 0;
  return template.replace(PLACEHOLDER, (placeholder) =>
    index < values.length ? values[index++] : placeholder
  );
};

/**
 * String form of a positional argument. An argument that cannot be turned into
 * a string at all makes the whole record degrade.
 */
const renderArgument = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || value === undefined || typeof value !== 'object') {
    return typeof value === 'function' ? `[Function ${value.name || 'anonymous'}]` : String(value);
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
};

const singleLine = (text: string): string => text.replace(/\r?\n/g, '\\n');

/**
 * Builds structured records from a log call and the ambient metadata of the
 * calling scope, masks sensitive values and writes the wire line.
 */
export class StructuredRecordAssembler {
  private readonly masking: PiiMaskingEngine;
  private readonly service: ServiceIdentity;
  private readonly recordFormat: RecordFormat;
  private readonly host: HostIdentity;
  private readonly clock: () => Date;
  private readonly log: DiagnosticsLogger;

  constructor(options: RecordAssemblerOptions) {
    this.masking = options.masking;
    this.service = Object.freeze({ ...options.service });
    this.recordFormat = options.format ?? 'ecs';
    this.host = options.host ?? getHostIdentity();
    this.clock = options.clock ?? (() => new Date());
    this.log = options.diagnostics ?? createDiagnosticsLogger('record-assembler');
  }

  assemble(
    level: LogLevel,
    loggerName: string,
    message: string,
    args: readonly unknown[],
    ambientMetadata: AmbientMetadata
  ): StructuredLogRecord {
    const placeholders = countPlaceholders(message);
    const last = args[args.length - 1];
    const thrown = args.length > placeholders && last instanceof Error ? last : undefined;
    const positional = thrown ? args.slice(0, -1) : args;

    const values = positional.map((arg) => {
      const rendered = renderArgument(arg);
      return this.masking.classify(rendered) ? this.masking.mask(rendered) : rendered;
    });

    const correlationId = ambientMetadata.get(CORRELATION_ID_KEY);
    const userId = ambientMetadata.get(USER_ID_KEY);
    const labels = this.labelsFrom(ambientMetadata);

    return {
      timestamp: this.clock().toISOString(),
      host: { name: this.host.name, ip: this.host.ip },
      process: { pid: process.pid, threadName: currentThreadName() },
      log: { level, loggerName },
      service: { ...this.service },
      ...(correlationId !== undefined && { correlation: { id: correlationId } }),
      ...(userId !== undefined && { user: { id: userId } }),
      message: interpolate(message, values),
      ...(labels && { labels }),
      ...(thrown && {
        error: {
          type: thrown.name,
          message: thrown.message,
          stackTrace: thrown.stack ?? `${thrown.name}: ${thrown.message}`,
        },
      }),
    };
  }

  serialize(record: StructuredLogRecord): string {
    if (this.recordFormat === 'plain') {
      const labels = Object.entries(record.labels ?? {})
        .map(([key, value]) => ` ${key}=${value}`)
        .join('');
      return singleLine(
        `${record.timestamp} ${record.log.level} ${record.log.loggerName} ` +
          `[${record.correlation?.id ?? '-'}] ${record.message}${labels}`
      );
    }
    return JSON.stringify(record);
  }

  /**
   * Assemble and serialize. Never throws: a record that cannot be built becomes a
   * plain-text fallback line carrying the raw message template.
   */
  format(
    level: LogLevel,
    loggerName: string,
    message: string,
    args: readonly unknown[],
    ambientMetadata: AmbientMetadata
  ): string {
    try {
      return this.serialize(this.assemble(level, loggerName, message, args, ambientMetadata));
    } catch (error) {
      const degraded = new SerializationDegradedError(
        `Structured record for logger '${loggerName}' degraded to plain text`,
        error
      );
      this.log.warn(
        { code: degraded.errorCode, loggerName, reason: describeError(error) },
        degraded.message
      );
      return this.fallback(level, loggerName, message, ambientMetadata);
    }
  }

  private fallback(level: LogLevel, loggerName: string, message: string, ambientMetadata: AmbientMetadata): string {
    try {
      const correlationId = ambientMetadata.get(CORRELATION_ID_KEY) ?? '-';
      return singleLine(`${this.clock().toISOString()} ${level} ${loggerName} [${correlationId}] ${message}`);
    } catch {
      return `${level} ${loggerName} [-] record could not be serialized`;
    }
  }

  private labelsFrom(ambientMetadata: AmbientMetadata): Record<string, string> | undefined {
    const entries: [string, string][] = [];

    for (const [key, value] of ambientMetadata) {
      if (key === CORRELATION_ID_KEY || key === USER_ID_KEY || key === SERVICE_ID_KEY) {
        continue;
      }
      const sensitive = this.masking.classify(key) || this.masking.classify(value);
      entries.push([key, sensitive ? this.masking.mask(value) : value]);
    }

    // own properties, so a `__proto__` key stays a label
    return entries.length > 0 ? Object.fromEntries(entries) : undefined;
  }
}
