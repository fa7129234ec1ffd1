/**
 * Validate one file given on the command line.
 */
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { validateContent } from './content-validator.js';
import { validateFileName } from './name-validator.js';
import type { FileValidationResult, Violation } from './types.js';

/**
 * Check the file name and, when the file exists, its header.
 * Never writes to the file.
 */
export async function validateFile(filePath: string): Promise<FileValidationResult> {
  const nameResult = validateFileName(filePath);
  const violations: Violation[] = [...nameResult.violations];

  const exists = await fileExists(filePath);
  if (exists) {
    let content: string;
    try {
      content = await readFile(filePath);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.READ_FAILED,
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath }
      );
    }
    violations.push(...validateContent(content, nameResult.moduleType));
  }

  const errors = violations.filter((v) => v.severity === 'error');
  const warnings = violations.filter((v) => v.severity === 'warning');

  return {
    file: filePath,
    exists,
    moduleType: nameResult.moduleType,
    status: errors.length > 0 ? 'fail' : warnings.length > 0 ? 'warn' : 'pass',
    errors,
    warnings,
  };
}
