import { ValidationFailedError } from '../../observability';

export enum PaymentMethod {
  CREDIT_CARD = 'CREDIT_CARD',
  DEBIT_CARD = 'DEBIT_CARD',
  ACH = 'ACH',
  WIRE_TRANSFER = 'WIRE_TRANSFER',
  DIGITAL_WALLET = 'DIGITAL_WALLET',
  BANK_TRANSFER = 'BANK_TRANSFER',
  CHECK = 'CHECK',
}

export const isCardBased = (method: PaymentMethod): boolean =>
  method === PaymentMethod.CREDIT_CARD || method === PaymentMethod.DEBIT_CARD;

export enum FailureReason {
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  INVALID_CARD = 'INVALID_CARD',
  EXPIRED_CARD = 'EXPIRED_CARD',
  NETWORK_ERROR = 'NETWORK_ERROR',
  FRAUD_DETECTED = 'FRAUD_DETECTED',
  MERCHANT_BLOCKED = 'MERCHANT_BLOCKED',
  LIMIT_EXCEEDED = 'LIMIT_EXCEEDED',
  INVALID_CVV = 'INVALID_CVV',
  CARD_BLOCKED = 'CARD_BLOCKED',
  SYSTEM_ERROR = 'SYSTEM_ERROR',
  TIMEOUT = 'TIMEOUT',
  DUPLICATE_TRANSACTION = 'DUPLICATE_TRANSACTION',
}

interface FailureReasonInfo {
  description: string;
  retryable: boolean;
  requiresCustomerAction: boolean;
}

export const failureReasons: Record<FailureReason, FailureReasonInfo> = {
  [FailureReason.INSUFFICIENT_FUNDS]: { description: 'Insufficient funds', retryable: false, requiresCustomerAction: true },
  [FailureReason.INVALID_CARD]: { description: 'Invalid card number', retryable: false, requiresCustomerAction: true },
  [FailureReason.EXPIRED_CARD]: { description: 'Card expired', retryable: false, requiresCustomerAction: true },
  [FailureReason.NETWORK_ERROR]: { description: 'Network communication error', retryable: true, requiresCustomerAction: false },
  [FailureReason.FRAUD_DETECTED]: { description: 'Fraudulent activity detected', retryable: false, requiresCustomerAction: false },
  [FailureReason.MERCHANT_BLOCKED]: { description: 'Merchant account blocked', retryable: false, requiresCustomerAction: false },
  [FailureReason.LIMIT_EXCEEDED]: { description: 'Transaction limit exceeded', retryable: false, requiresCustomerAction: true },
  [FailureReason.INVALID_CVV]: { description: 'Invalid CVV', retryable: false, requiresCustomerAction: true },
  [FailureReason.CARD_BLOCKED]: { description: 'Card blocked by issuer', retryable: false, requiresCustomerAction: false },
  [FailureReason.SYSTEM_ERROR]: { description: 'Internal system error', retryable: true, requiresCustomerAction: false },
  [FailureReason.TIMEOUT]: { description: 'Transaction timeout', retryable: true, requiresCustomerAction: false },
  [FailureReason.DUPLICATE_TRANSACTION]: { description: 'Duplicate transaction', retryable: false, requiresCustomerAction: false },
};

export const isRetryable = (reason: FailureReason): boolean => failureReasons[reason].retryable;

export const requiresCustomerAction = (reason: FailureReason): boolean =>
  failureReasons[reason].requiresCustomerAction;

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

/**
 * Non-negative amount in an ISO 4217 currency
 */
export class Money {
  private constructor(
    readonly amount: number,
    readonly currency: string
  ) {
    Object.freeze(this);
  }

  static of(amount: number, currency: string): Money {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationFailedError('amount', 'Amount cannot be negative');
    }
    if (!CURRENCY_PATTERN.test(currency)) {
      throw new ValidationFailedError('currency', `Unknown currency code: ${currency}`);
    }
    return new Money(Math.round(amount * 100) / 100, currency);
  }

  isZero(): boolean {
    return this.amount === 0;
  }

  toString(): string {
    return `${this.amount.toFixed(2)} ${this.currency}`;
  }

  toJSON(): { amount: number; currency: string } {
    return { amount: this.amount, currency: this.currency };
  }
}

interface PaymentEventBase {
  transactionId: string;
  customerId: string;
  amount: Money;
  paymentDescription: string;
  paymentMethod: PaymentMethod;
  eventCategory: string;
  eventType: string;
  eventAction: string;
  eventOutcome: string;
}

export interface PaymentSuccessEvent extends PaymentEventBase {
  authorizationCode: string;
  transactionTimestamp: Date;
  processingTimeMs: number;
}

export interface PaymentFailedEvent extends PaymentEventBase {
  errorCode: string;
  errorMessage: string;
  retryAttempt: number;
  failureReason: FailureReason;
}

type PaymentEventInput = Pick<
  PaymentEventBase,
  'transactionId' | 'customerId' | 'amount' | 'paymentDescription' | 'paymentMethod'
>;

// payments slower than this are flagged in the success record
export const SLOW_PROCESSING_MS = 30_000;

export const createPaymentSuccessEvent = (
  input: PaymentEventInput & { authorizationCode: string; processingTimeMs: number }
): PaymentSuccessEvent => {
  if (input.processingTimeMs < 0) {
    throw new ValidationFailedError('processingTimeMs', 'Processing time cannot be negative');
  }
  return {
    ...input,
    transactionTimestamp: new Date(),
    eventCategory: 'payment',
    eventType: 'success',
    eventAction: 'processed',
    eventOutcome: 'success',
  };
};

export const createPaymentFailedEvent = (
  input: PaymentEventInput & {
    errorCode: string;
    errorMessage: string;
    retryAttempt: number;
    failureReason: FailureReason;
  }
): PaymentFailedEvent => {
  if (input.retryAttempt < 0) {
    throw new ValidationFailedError('retryAttempt', 'Retry attempt cannot be negative');
  }
  return {
    ...input,
    eventCategory: 'payment',
    eventType: 'failure',
    eventAction: 'rejected',
    eventOutcome: 'failure',
  };
};

export const isSlowProcessing = (event: PaymentSuccessEvent): boolean =>
  event.processingTimeMs > SLOW_PROCESSING_MS;

export type PaymentStatus = 'COMPLETED' | 'FAILED';

export interface Payment {
  paymentId: string;
  transactionId: string;
  customerId: string;
  amount: Money;
  method: PaymentMethod;
  description: string;
  status: PaymentStatus;
  authorizationCode?: string;
  failureReason?: FailureReason;
  createdAt: Date;
}

export interface CreatePaymentInput {
  customerId: string;
  amount: number;
  currency?: string;
  method: PaymentMethod;
  description?: string;
}
