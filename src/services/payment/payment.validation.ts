import { body, param } from 'express-validator';
import { PaymentMethod } from './payment.types';

export const createPaymentValidation = [
  body('customerId')
    .notEmpty()
    .withMessage('Customer ID is required')
    .isString()
    .withMessage('Customer ID must be a string')
    .isLength({ max: 64 })
    .withMessage('Customer ID must be at most 64 characters'),
  body('amount')
    .notEmpty()
    .withMessage('Amount is required')
    .isFloat({ min: 0.01 })
    .withMessage('Amount must be a positive number greater than 0')
    .custom((value: unknown) => {
      const decimalPlaces = (String(value).split('.')[1] ?? '').length;
      if (decimalPlaces > 2) {
        throw new Error('Amount can have at most 2 decimal places');
      }
      return true;
    }),
  body('currency')
    .optional()
    .matches(/^[A-Z]{3}$/)
    .withMessage('Currency must be a 3-letter ISO code'),
  body('method')
    .notEmpty()
    .withMessage('Payment method is required')
    .isIn(Object.values(PaymentMethod))
    .withMessage(`Payment method must be one of: ${Object.values(PaymentMethod).join(', ')}`),
  body('description')
    .optional()
    .isString()
    .withMessage('Description must be a string')
    .isLength({ max: 140 })
    .withMessage('Description must be at most 140 characters'),
];

export const getPaymentValidation = [
  param('id')
    .notEmpty()
    .withMessage('Payment ID is required')
    .isString()
    .withMessage('Payment ID must be a string'),
];
