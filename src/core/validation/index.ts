/**
 * Validation exports barrel file.
 */
export { validateFileName } from './name-validator.js';
export { validateContent } from './content-validator.js';
export { validateFile } from './file-validator.js';
export type {
  Severity,
  NameRule,
  ContentRule,
  Violation,
  NameValidationResult,
  FileValidationResult,
} from './types.js';
