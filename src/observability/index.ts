// Diagnostics logger exports
export { diagnostics, createDiagnosticsLogger, DiagnosticsLogger } from './logger';

// Structured logging pipeline exports
export {
  LoggingPipeline,
  LoggingPipelineOptions,
  RecordSink,
  StructuredLogger,
  configureLogging,
  getLoggingPipeline,
  createLogger,
} from './pipeline';
export { LogLevel, isLevelEnabled, parseLogLevel } from './levels';
export { StructuredLogRecord, StructuredRecordAssembler, RecordAssemblerOptions } from './record-assembler';
export {
  HostIdentity,
  HostIdentityResolver,
  UNKNOWN_HOST,
  UNKNOWN_IP,
  resolveHostIdentity,
  getHostIdentity,
} from './host-identity';

// Masking exports
export {
  PiiMaskingEngine,
  MaskingRule,
  createMaskingRule,
  DEFAULT_SENSITIVE_FIELDS,
  MASK_MARKER,
} from './masking';

// Correlation context exports
export {
  generateCorrelationId,
  isValidCorrelationIdFormat,
  correlationIdTimestamp,
  DEFAULT_CORRELATION_PREFIX,
} from './correlation-id';
export { TransactionContext, Annotations } from './transaction-context';
export {
  ContextPropagationStore,
  ContextBinding,
  AmbientMetadata,
  contextStore,
  CORRELATION_ID_KEY,
  USER_ID_KEY,
  SERVICE_ID_KEY,
  ANNOTATION_PREFIX,
} from './context-store';

// Correlation middleware
export {
  createCorrelationMiddleware,
  extractCorrelationId,
  CorrelationMiddlewareOptions,
  CorrelationState,
  CORRELATION_ID_HEADER,
  TRACE_ID_HEADER,
} from './correlation';

// Outbound propagation
export { correlationHeaders, applyCorrelationHeader, attachCorrelationInterceptor } from './outbound';

// Errors
export {
  PipelineError,
  ValidationFailedError,
  InvalidArgumentError,
  ResolutionFailedError,
  SerializationDegradedError,
  ConfigurationError,
  describeError,
} from './errors';
