// Result
export { Result } from './result/result.js';

// Errors
export {
  ConflictError,
  DomainError,
  InvariantViolation,
  NotFoundError,
  ValidationError,
} from './errors/domain-error.js';
