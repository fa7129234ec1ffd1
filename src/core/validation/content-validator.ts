/**
 * Header checks for an existing module file.
 */
import { ErrorCodes } from '../../utils/errors.js';
import { MODULE_TYPE_INFO, moduleTypeFromContentType } from '../module/module-type.js';
import type { ModuleType } from '../module/types.js';
import type { Violation } from './types.js';

// Older files use the `:_content-type:` spelling.
const CONTENT_TYPE_LINE = /^:_(?:mod-docs-)?content-type:[ \t]*(\S*)[ \t]*$/;
const ANCHOR_LINE = /^\[id="([^"]*)"\][ \t]*$/;
const TITLE_LINE = /^= \S/;
const CONTEXT_SUFFIX = '_{context}';

interface LineMatch {
  line: number;
  match: RegExpMatchArray;
}

function findLine(lines: string[], pattern: RegExp): LineMatch | undefined {
  for (let i = 0; i < lines.length; i++) {
    const match = lines[i].match(pattern);
    if (match) {
      return { line: i + 1, match };
    }
  }
  return undefined;
}

/**
 * Check the content-type attribute, the anchor and the title of a module.
 *
 * @param expectedType - type implied by the file-name prefix, if any
 */
export function validateContent(content: string, expectedType?: ModuleType): Violation[] {
  const lines = content.split(/\r?\n/);
  const violations: Violation[] = [];

  const contentType = findLine(lines, CONTENT_TYPE_LINE);
  const declared = contentType?.match[1] ?? '';
  const declaredType = declared ? moduleTypeFromContentType(declared) : undefined;

  if (!contentType || declared === '') {
    violations.push({
      code: ErrorCodes.CONTENT_TYPE_MISSING,
      rule: 'content_type',
      severity: 'error',
      message: 'The file does not declare its module type',
      fixHint: expectedType
        ? `Add ':_mod-docs-content-type: ${MODULE_TYPE_INFO[expectedType].contentType}' as the first line`
        : `Add a ':_mod-docs-content-type:' attribute as the first line`,
    });
  } else if (!declaredType) {
    violations.push({
      code: ErrorCodes.CONTENT_TYPE_MISMATCH,
      rule: 'content_type_match',
      severity: 'error',
      message: `Unknown content type '${declared}'`,
      line: contentType.line,
    });
  } else if (expectedType && declaredType !== expectedType) {
    violations.push({
      code: ErrorCodes.CONTENT_TYPE_MISMATCH,
      rule: 'content_type_match',
      severity: 'error',
      message: `The file declares content type '${declared}' but its name marks it as a ${MODULE_TYPE_INFO[expectedType].label.toLowerCase()}`,
      fixHint: `Rename the file or set the content type to '${MODULE_TYPE_INFO[expectedType].contentType}'`,
      line: contentType.line,
    });
  }

  // Snippets have neither an anchor nor a title.
  if ((expectedType ?? declaredType) === 'snippet') {
    return violations;
  }

  const anchor = findLine(lines, ANCHOR_LINE);
  if (!anchor) {
    violations.push({
      code: ErrorCodes.ANCHOR_MISSING,
      rule: 'anchor',
      severity: 'error',
      message: 'The file has no [id="..."] anchor',
      fixHint: `Add [id="<file-name-stem>${CONTEXT_SUFFIX}"] above the title`,
    });
  } else if (!anchor.match[1].endsWith(CONTEXT_SUFFIX)) {
    violations.push({
      code: ErrorCodes.ANCHOR_CONTEXT,
      rule: 'anchor_context',
      severity: 'warning',
      message: `Anchor '${anchor.match[1]}' does not end with '${CONTEXT_SUFFIX}'`,
      fixHint: `Append '${CONTEXT_SUFFIX}' so the module can be included more than once`,
      line: anchor.line,
    });
  }

  if (!findLine(lines, TITLE_LINE)) {
    violations.push({
      code: ErrorCodes.TITLE_MISSING,
      rule: 'title',
      severity: 'error',
      message: 'The file has no level-0 title (a line starting with "= ")',
    });
  }

  return violations;
}
