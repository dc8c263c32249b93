export { validateNonNegativeInteger, validateLessEqual, validateProbability } from './validators';
