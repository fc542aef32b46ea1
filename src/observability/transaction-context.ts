import { generateCorrelationId } from './correlation-id';
import { ValidationFailedError } from './errors';

export type Annotations = Readonly<Record<string, string>>;

interface TransactionContextState {
  correlationId: string;
  userId?: string;
  serviceId: string;
  createdAtMs: number;
  annotations: Annotations;
}

const isBlank = (value: string | undefined | null): boolean =>
  value === undefined || value === null || value.trim().length === 0;

const copyAnnotations = (annotations: Annotations): Annotations =>
  Object.freeze({ ...annotations });

/**
 * Immutable description of one logical operation (request, job, background task).
 *
 * Derivations (`withUser`, `withAnnotation`) return new instances; the original is
 * never touched, so a context can be shared freely between concurrent readers.
 */
export class TransactionContext {
  readonly correlationId: string;
  readonly userId?: string;
  readonly serviceId: string;
  readonly annotations: Annotations;
  private readonly createdAtMs: number;

  private constructor(state: TransactionContextState) {
    if (isBlank(state.correlationId)) {
      throw ValidationFailedError.blank('correlationId', 'Correlation ID');
    }
    if (isBlank(state.serviceId)) {
      throw ValidationFailedError.blank('serviceId', 'Service ID');
    }
    if (state.userId !== undefined && isBlank(state.userId)) {
      throw ValidationFailedError.blank('userId', 'User ID');
    }

    this.correlationId = state.correlationId;
    this.userId = state.userId;
    this.serviceId = state.serviceId;
    this.createdAtMs = state.createdAtMs;
    this.annotations = copyAnnotations(state.annotations);
    Object.freeze(this);
  }

  /**
   * New context with a generated correlation id
   */
  static create(serviceId: string): TransactionContext {
    return new TransactionContext({
      correlationId: generateCorrelationId(),
      serviceId,
      createdAtMs: Date.now(),
      annotations: {},
    });
  }

  /**
   * New context for a correlation id received from a caller
   */
  static of(correlationId: string, serviceId: string): TransactionContext {
    return new TransactionContext({
      correlationId,
      serviceId,
      createdAtMs: Date.now(),
      annotations: {},
    });
  }

  get createdAt(): Date {
    return new Date(this.createdAtMs);
  }

  withUser(userId: string | undefined): TransactionContext {
    return new TransactionContext({ ...this.state(), userId });
  }

  withAnnotation(key: string, value: string): TransactionContext {
    if (isBlank(key)) {
      throw ValidationFailedError.blank('annotations', 'Annotation key');
    }
    return new TransactionContext({
      ...this.state(),
      annotations: { ...this.annotations, [key]: value },
    });
  }

  annotation(key: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.annotations, key)
      ? this.annotations[key]
      : undefined;
  }

  toJSON(): Record<string, unknown> {
    return {
      correlationId: this.correlationId,
      ...(this.userId !== undefined && { userId: this.userId }),
      serviceId: this.serviceId,
      createdAt: this.createdAt.toISOString(),
      annotations: { ...this.annotations },
    };
  }

  private state(): TransactionContextState {
    return {
      correlationId: this.correlationId,
      userId: this.userId,
      serviceId: this.serviceId,
      createdAtMs: this.createdAtMs,
      annotations: this.annotations,
    };
  }
}
