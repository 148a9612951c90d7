export { LevelscanError, ContractViolationError, assertSourceText } from './errors.js';
