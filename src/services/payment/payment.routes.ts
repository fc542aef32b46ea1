import { Router } from 'express';
import { paymentController } from './payment.controller';
import { createPaymentValidation, getPaymentValidation } from './payment.validation';
import { asyncHandler, validateRequest } from '../../middlewares';

const router = Router();

// POST /payments - Process a payment
router.post('/', createPaymentValidation, validateRequest, asyncHandler((req, res) => paymentController.create(req, res)));

// GET /payments/:id - Get payment by ID
router.get('/:id', getPaymentValidation, validateRequest, asyncHandler((req, res) => paymentController.getById(req, res)));

export default router;
