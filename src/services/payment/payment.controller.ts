import { Request, Response } from 'express';
import { contextStore } from '../../observability';
import { paymentService, PaymentService } from './payment.service';
import { Payment } from './payment.types';

const toResponse = (payment: Payment) => ({
  paymentId: payment.paymentId,
  transactionId: payment.transactionId,
  customerId: payment.customerId,
  amount: payment.amount.amount,
  currency: payment.amount.currency,
  method: payment.method,
  description: payment.description,
  status: payment.status,
  ...(payment.authorizationCode !== undefined && { authorizationCode: payment.authorizationCode }),
  ...(payment.failureReason !== undefined && { failureReason: payment.failureReason }),
  createdAt: payment.createdAt.toISOString(),
});

export class PaymentController {
  constructor(private readonly service: PaymentService = paymentService) {}

  /**
   * Process a payment
   * POST /payments
   */
  async create(req: Request, res: Response): Promise<void> {
    const customerId = String(req.body.customerId);

    // records for the rest of this request carry the paying customer
    contextStore.update((context) => context.withUser(customerId));

    const payment = await this.service.processPayment({
      customerId,
      amount: Number(req.body.amount),
      currency: typeof req.body.currency === 'string' ? req.body.currency : undefined,
      method: req.body.method,
      description: typeof req.body.description === 'string' ? req.body.description : undefined,
    });

    res.status(payment.status === 'COMPLETED' ? 201 : 402).json({
      success: payment.status === 'COMPLETED',
      data: { payment: toResponse(payment) },
    });
  }

  /**
   * Get payment by ID
   * GET /payments/:id
   */
  async getById(req: Request, res: Response): Promise<void> {
    const payment = await this.service.getPayment(req.params.id);

    res.status(200).json({
      success: true,
      data: { payment: toResponse(payment) },
    });
  }
}

export const paymentController = new PaymentController();
