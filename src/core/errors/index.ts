export { ProbabilityError, ErrorCode, isProbabilityError } from './ProbabilityError';
