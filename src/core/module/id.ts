/**
 * Title-to-id conversion.
 */
import { ModuleError, ErrorCodes } from '../../utils/errors.js';
import type { Options } from '../options/schema.js';
import { MODULE_TYPE_INFO } from './module-type.js';
import type { ModuleType } from './types.js';

/** Joins the words of an id. */
export const ID_SEPARATOR = '-';

// Anything that is not a letter, a combining mark or a digit separates words.
// Uppercase and titlecase letters that survive lower-casing count as separators too.
const NON_WORD_RUN = /(?:[^\p{L}\p{M}\p{N}]|[\p{Lu}\p{Lt}])+/gu;

/**
 * Convert a free-text title to a file-name stem.
 * Compatibility forms are folded first, so `ℂ` and `𝐀` become `c` and `a`.
 *
 * @example
 * toId('My First Concept') // 'my-first-concept'
 * toId('  Using "foo" & bar!  ') // 'using-foo-bar'
 */
export function toId(title: string): string {
  return title
    .normalize('NFKC')
    .toLowerCase()
    .replace(NON_WORD_RUN, ID_SEPARATOR)
    .replace(/^-+|-+$/g, '');
}

/**
 * Build the id of a module, with the type prefix when prefixes are enabled.
 */
export function moduleId(
  moduleType: ModuleType,
  title: string,
  options: Pick<Options, 'prefixes'>
): string {
  const stem = toId(title);
  if (stem === '') {
    throw new ModuleError(
      ErrorCodes.EMPTY_TITLE,
      `Title '${title}' does not contain any letters or digits`,
      { title, moduleType }
    );
  }

  return options.prefixes ? `${MODULE_TYPE_INFO[moduleType].prefix}${stem}` : stem;
}
