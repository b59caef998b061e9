export {
  validateTree,
  type ValidationResult,
  type TreeValidationError,
  type TreeValidationWarning,
  type ValidationOptions,
} from './tree-validation.js';
