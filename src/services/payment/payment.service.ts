import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { contextStore, ContextPropagationStore } from '../../observability';
import { PaymentLogger, paymentLogger } from './payment.logger';
import {
  CreatePaymentInput,
  createPaymentFailedEvent,
  createPaymentSuccessEvent,
  FailureReason,
  failureReasons,
  Money,
  Payment,
} from './payment.types';

export interface PaymentServiceOptions {
  limit?: number;
  defaultCurrency?: string;
  logger?: PaymentLogger;
  store?: ContextPropagationStore;
}

export class PaymentService {
  private readonly payments = new Map<string, Payment>();
  private readonly limit: number;
  private readonly defaultCurrency: string;
  private readonly logger: PaymentLogger;
  private readonly store: ContextPropagationStore;

  constructor(options: PaymentServiceOptions = {}) {
    this.limit = options.limit ?? config.payment.limit;
    this.defaultCurrency = options.defaultCurrency ?? config.payment.defaultCurrency;
    this.logger = options.logger ?? paymentLogger;
    this.store = options.store ?? contextStore;
  }

  /**
   * Process a payment and record its outcome.
   * Amounts above the configured limit are declined with LIMIT_EXCEEDED.
   */
  async processPayment(input: CreatePaymentInput): Promise<Payment> {
    const startedAt = Date.now();
    const paymentId = `pay_${uuidv4()}`;
    const amount = Money.of(input.amount, input.currency ?? this.defaultCurrency);
    const transactionId = this.store.correlationId() ?? paymentId;
    const description = input.description ?? '';

    const base = {
      transactionId,
      customerId: input.customerId,
      amount,
      paymentDescription: description,
      paymentMethod: input.method,
    };

    if (amount.isZero()) {
      throw ApiError.invalidAmount('Amount must be greater than 0');
    }

    if (amount.amount > this.limit) {
      const failureReason = FailureReason.LIMIT_EXCEEDED;
      const payment: Payment = {
        paymentId,
        transactionId,
        customerId: input.customerId,
        amount,
        method: input.method,
        description,
        status: 'FAILED',
        failureReason,
        createdAt: new Date(),
      };
      this.payments.set(paymentId, payment);
      this.logger.logFailure(
        createPaymentFailedEvent({
          ...base,
          errorCode: failureReason,
          errorMessage: failureReasons[failureReason].description,
          retryAttempt: 0,
          failureReason,
        })
      );
      return payment;
    }

    const authorizationCode = `AUTH-${uuidv4().slice(0, 8).toUpperCase()}`;
    const payment: Payment = {
      paymentId,
      transactionId,
      customerId: input.customerId,
      amount,
      method: input.method,
      description,
      status: 'COMPLETED',
      authorizationCode,
      createdAt: new Date(),
    };
    this.payments.set(paymentId, payment);
    this.logger.logSuccess(
      createPaymentSuccessEvent({
        ...base,
        authorizationCode,
        processingTimeMs: Date.now() - startedAt,
      })
    );
    return payment;
  }

  async getPayment(paymentId: string): Promise<Payment> {
    const payment = this.payments.get(paymentId);
    if (!payment) {
      throw ApiError.notFound('Payment');
    }
    return payment;
  }

  clear(): void {
    this.payments.clear();
  }
}

export const paymentService = new PaymentService();
