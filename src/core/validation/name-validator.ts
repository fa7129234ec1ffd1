/**
 * File-name validation against the module naming convention.
 *
 * A valid name is `<prefix><stem>.adoc` where the stem is lowercase words
 * joined by single hyphens. Every rule runs, so one name can collect several
 * violations. A missing prefix is only a warning because ids may be
 * generated without prefixes.
 */
import { basename, extname } from 'node:path';
import { ErrorCodes } from '../../utils/errors.js';
import {
  MODULE_EXTENSION,
  MODULE_TYPES,
  MODULE_TYPE_INFO,
  moduleTypeFromPrefix,
} from '../module/module-type.js';
import type { NameValidationResult, Violation } from './types.js';

const UPPERCASE = /[\p{Lu}\p{Lt}]/u;
const DISALLOWED = /[^\p{L}\p{M}\p{N}-]/gu;

function describeChars(chars: string[]): string {
  return [...new Set(chars)].map((c) => `'${c}'`).join(', ');
}

/**
 * Validate a file name. Directory parts of the path are ignored.
 */
export function validateFileName(fileName: string): NameValidationResult {
  const name = basename(fileName);
  const extension = extname(name);
  const base = extension ? name.slice(0, -extension.length) : name;
  const moduleType = moduleTypeFromPrefix(base);
  const stem = moduleType ? base.slice(MODULE_TYPE_INFO[moduleType].prefix.length) : base;

  const violations: Violation[] = [];

  if (!moduleType) {
    const prefixes = MODULE_TYPES.map((type) => MODULE_TYPE_INFO[type].prefix).join(', ');
    violations.push({
      code: ErrorCodes.NAME_PREFIX,
      rule: 'module_prefix',
      severity: 'warning',
      message: `File name '${name}' does not start with a module-type prefix`,
      fixHint: `Start the name with one of: ${prefixes}`,
    });
  }

  if (stem === '') {
    violations.push({
      code: ErrorCodes.NAME_EMPTY_STEM,
      rule: 'non_empty_stem',
      severity: 'error',
      message: `File name '${name}' has nothing after its prefix`,
      fixHint: 'Add the module title, in lowercase words joined by hyphens',
    });
  }

  if (UPPERCASE.test(stem)) {
    violations.push({
      code: ErrorCodes.NAME_UPPERCASE,
      rule: 'lowercase',
      severity: 'error',
      message: `File name '${name}' contains uppercase letters`,
      fixHint: `Rename the file to '${base.toLowerCase()}${MODULE_EXTENSION}'`,
    });
  }

  const disallowed = stem.match(DISALLOWED);
  if (disallowed) {
    violations.push({
      code: ErrorCodes.NAME_CHARSET,
      rule: 'allowed_characters',
      severity: 'error',
      message: `File name '${name}' contains characters other than letters, digits and hyphens: ${describeChars(disallowed)}`,
      fixHint: 'Replace them with hyphens',
    });
  }

  if (stem.includes('--') || stem.startsWith('-') || stem.endsWith('-')) {
    violations.push({
      code: ErrorCodes.NAME_SEPARATORS,
      rule: 'separators',
      severity: 'error',
      message: `File name '${name}' has consecutive, leading or trailing hyphens`,
      fixHint: 'Join words with exactly one hyphen',
    });
  }

  if (extension !== MODULE_EXTENSION) {
    violations.push({
      code: ErrorCodes.NAME_EXTENSION,
      rule: 'extension',
      severity: 'error',
      message: extension
        ? `File name '${name}' has extension '${extension}' instead of '${MODULE_EXTENSION}'`
        : `File name '${name}' has no '${MODULE_EXTENSION}' extension`,
      fixHint: `Use the '${MODULE_EXTENSION}' extension`,
    });
  }

  return {
    fileName: name,
    moduleType,
    passed: violations.every((v) => v.severity !== 'error'),
    violations,
  };
}
