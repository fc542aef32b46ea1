export { paymentService, PaymentService, PaymentServiceOptions } from './payment.service';
export { paymentController, PaymentController } from './payment.controller';
export { paymentLogger, PaymentLogger, successLabels, failureLabels } from './payment.logger';
export * from './payment.types';
export { default as paymentRoutes } from './payment.routes';
