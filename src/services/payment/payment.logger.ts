import { ContextPropagationStore, contextStore, createLogger, StructuredLogger } from '../../observability';
import {
  failureReasons,
  isSlowProcessing,
  PaymentFailedEvent,
  PaymentSuccessEvent,
} from './payment.types';

const eventLabels = (
  event: PaymentSuccessEvent | PaymentFailedEvent
): Record<string, string> => ({
  'payment.transactionId': event.transactionId,
  'payment.customerId': event.customerId,
  'payment.amount': event.amount.toString(),
  'payment.method': event.paymentMethod,
  'payment.description': event.paymentDescription,
  'event.category': event.eventCategory,
  'event.type': event.eventType,
  'event.action': event.eventAction,
  'event.outcome': event.eventOutcome,
});

export const successLabels = (event: PaymentSuccessEvent): Record<string, string> => ({
  ...eventLabels(event),
  'payment.authorizationCode': event.authorizationCode,
  'payment.processingTimeMs': String(event.processingTimeMs),
  'payment.transactionTimestamp': event.transactionTimestamp.toISOString(),
});

export const failureLabels = (event: PaymentFailedEvent): Record<string, string> => ({
  ...eventLabels(event),
  'payment.errorCode': event.errorCode,
  'payment.errorReason': event.errorMessage,
  'payment.failureReason': event.failureReason,
  'payment.retryAttempt': String(event.retryAttempt),
  'payment.retryable': String(failureReasons[event.failureReason].retryable),
});

/**
 * Writes payment outcome records. Event fields travel as ambient entries scoped
 * to the one record, so they land in `labels` and pass through masking like any
 * other label.
 */
export class PaymentLogger {
  constructor(
    private readonly logger: StructuredLogger = createLogger('PaymentLogger'),
    private readonly store: ContextPropagationStore = contextStore
  ) {}

  logSuccess(event: PaymentSuccessEvent): void {
    this.store.runWithMetadata(successLabels(event), () => {
      if (isSlowProcessing(event)) {
        this.logger.warn('Payment {} processed slowly in {} ms', event.transactionId, event.processingTimeMs);
        return;
      }
      this.logger.info('Payment {} processed', event.transactionId);
    });
  }

  logFailure(event: PaymentFailedEvent): void {
    this.store.runWithMetadata(failureLabels(event), () => {
      this.logger.error('Payment {} failed: {}', event.transactionId, failureReasons[event.failureReason].description);
    });
  }
}

export const paymentLogger = new PaymentLogger();
