import pino, { DestinationStream } from 'pino';

import { createConfigChain, LoggingSettings, resolveLoggingSettings } from '../config/logging';
import { ContextPropagationStore, contextStore } from './context-store';
import { describeError } from './errors';
import { HostIdentity } from './host-identity';
import { isLevelEnabled, LogLevel } from './levels';
import { createDiagnosticsLogger, DiagnosticsLogger } from './logger';
import { createMaskingRule, PiiMaskingEngine } from './masking';
import { StructuredRecordAssembler } from './record-assembler';

/**
 * Where serialized records go; any pino destination works
 */
export type RecordSink = Pick<DestinationStream, 'write'>;

export interface LoggingPipelineOptions {
  settings: LoggingSettings;
  store?: ContextPropagationStore;
  sink?: RecordSink;
  host?: HostIdentity;
  clock?: () => Date;
  diagnostics?: DiagnosticsLogger;
}

let stdout: RecordSink | undefined;

/**
 * Process-wide stdout destination shared by every pipeline without its own sink
 */
const stdoutSink = (): RecordSink => {
  if (!stdout) {
    stdout = pino.destination({ dest: 1, sync: true });
  }
  return stdout;
};

/**
 * Named logger handed to application code. Resolves its pipeline per call, so
 * module-level loggers created before startup pick up the configured pipeline.
 */
export class StructuredLogger {
  constructor(
    readonly name: string,
    private readonly resolve: () => LoggingPipeline
  ) {}

  /**
   * Emit one record. `{}` placeholders in `message` are filled from `args` in
   * order; a trailing Error not consumed by a placeholder becomes the `error`
   * group. Never throws.
   */
  logEvent(level: LogLevel, message: string, ...args: unknown[]): void {
    this.resolve().emit(level, this.name, message, args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.logEvent(LogLevel.TRACE, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.logEvent(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.logEvent(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.logEvent(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.logEvent(LogLevel.ERROR, message, ...args);
  }

  isEnabled(level: LogLevel): boolean {
    return this.resolve().isEnabled(level);
  }
}

/**
 * Wires store, masking engine, assembler and sink for one set of settings
 */
export class LoggingPipeline {
  readonly settings: LoggingSettings;
  readonly store: ContextPropagationStore;
  readonly masking: PiiMaskingEngine;
  readonly assembler: StructuredRecordAssembler;
  private readonly sink: RecordSink;
  private readonly log: DiagnosticsLogger;
  private readonly loggers = new Map<string, StructuredLogger>();

  constructor(options: LoggingPipelineOptions) {
    this.settings = options.settings;
    this.store = options.store ?? contextStore;
    this.log = options.diagnostics ?? createDiagnosticsLogger('logging-pipeline');
    this.masking = new PiiMaskingEngine(
      createMaskingRule({
        enabled: options.settings.masking.enabled,
        additionalFields: options.settings.masking.additionalFields,
      })
    );
    this.assembler = new StructuredRecordAssembler({
      masking: this.masking,
      service: options.settings.service,
      format: options.settings.format,
      host: options.host,
      clock: options.clock,
      diagnostics: this.log,
    });
    this.sink = options.sink ?? stdoutSink();
  }

  getLogger(name: string): StructuredLogger {
    let logger = this.loggers.get(name);
    if (!logger) {
      logger = new StructuredLogger(name, () => this);
      this.loggers.set(name, logger);
    }
    return logger;
  }

  isEnabled(level: LogLevel): boolean {
    return this.settings.enabled && isLevelEnabled(level, this.settings.level);
  }

  emit(level: LogLevel, loggerName: string, message: string, args: readonly unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const line = this.assembler.format(level, loggerName, message, args, this.store.metadata());
    try {
      this.sink.write(`${line}\n`);
    } catch (error) {
      this.log.error({ loggerName, reason: describeError(error) }, 'Failed to write structured log record');
    }
  }
}

let defaultPipeline: LoggingPipeline | undefined;

/**
 * Install the process-wide pipeline. Called once at startup after the
 * configuration precedence has been enforced.
 */
export const configureLogging = (options: LoggingPipelineOptions): LoggingPipeline => {
  defaultPipeline = new LoggingPipeline(options);
  return defaultPipeline;
};

/**
 * The process-wide pipeline, built from the environment on first use when
 * startup has not configured one
 */
export const getLoggingPipeline = (): LoggingPipeline => {
  if (!defaultPipeline) {
    defaultPipeline = new LoggingPipeline({ settings: resolveLoggingSettings(createConfigChain()) });
  }
  return defaultPipeline;
};

export const createLogger = (name: string): StructuredLogger =>
  new StructuredLogger(name, getLoggingPipeline);
