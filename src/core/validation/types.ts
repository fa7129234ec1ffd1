/**
 * Validation type definitions.
 */
import type { ErrorCode } from '../../utils/errors.js';
import type { ModuleType } from '../module/types.js';

export type Severity = 'error' | 'warning';

export type NameRule =
  | 'module_prefix'
  | 'lowercase'
  | 'allowed_characters'
  | 'separators'
  | 'extension'
  | 'non_empty_stem';

export type ContentRule =
  | 'content_type'
  | 'content_type_match'
  | 'anchor'
  | 'anchor_context'
  | 'title';

/**
 * A single rule violation.
 */
export interface Violation {
  /** Error code (N001, D001, ...) */
  code: ErrorCode;
  /** The rule that was violated */
  rule: NameRule | ContentRule;
  severity: Severity;
  /** Human-readable message */
  message: string;
  /** Suggested fix */
  fixHint?: string;
  /** Line number in the file, for content rules */
  line?: number;
}

/**
 * Result of checking a file name against the naming convention.
 */
export interface NameValidationResult {
  /** Base name that was checked */
  fileName: string;
  /** Module type implied by the prefix, if any */
  moduleType?: ModuleType;
  /** True when no error-severity violation was found */
  passed: boolean;
  violations: Violation[];
}

/**
 * Result of validating one file: its name and, if it exists, its header.
 */
export interface FileValidationResult {
  /** Path as given on the command line */
  file: string;
  /** Whether the file exists; content rules only run when it does */
  exists: boolean;
  moduleType?: ModuleType;
  status: 'pass' | 'fail' | 'warn';
  errors: Violation[];
  warnings: Violation[];
}
