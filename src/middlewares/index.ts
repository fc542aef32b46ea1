/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  ApiError,
  AppError,
  asyncHandler,
} from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';
