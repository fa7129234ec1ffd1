/**
 * The closed set of module types and their fixed naming policy.
 */
import { ModuleError, ErrorCodes } from '../../utils/errors.js';
import type { ModuleType, ModuleTypeInfo } from './types.js';

/** Extension of every generated module file. */
export const MODULE_EXTENSION = '.adoc';

/**
 * Order in which module types are read from the command line.
 */
export const MODULE_TYPES: readonly ModuleType[] = [
  'assembly',
  'concept',
  'procedure',
  'reference',
  'snippet',
];

export const MODULE_TYPE_INFO: Record<ModuleType, ModuleTypeInfo> = {
  assembly: {
    label: 'Assembly',
    prefix: 'assembly_',
    contentType: 'ASSEMBLY',
    includeDir: 'assemblies',
  },
  concept: {
    label: 'Concept',
    prefix: 'con_',
    contentType: 'CONCEPT',
    includeDir: 'modules',
  },
  procedure: {
    label: 'Procedure',
    prefix: 'proc_',
    contentType: 'PROCEDURE',
    includeDir: 'modules',
  },
  reference: {
    label: 'Reference',
    prefix: 'ref_',
    contentType: 'REFERENCE',
    includeDir: 'modules',
  },
  snippet: {
    label: 'Snippet',
    prefix: 'snip_',
    contentType: 'SNIPPET',
    includeDir: 'snippets',
  },
};

/**
 * Map a command-line flag name to its module type.
 * `include-in` produces the populated assembly.
 */
export function parseModuleType(token: string): ModuleType {
  switch (token) {
    case 'assembly':
    case 'include-in':
      return 'assembly';
    case 'concept':
    case 'procedure':
    case 'reference':
    case 'snippet':
      return token;
    default:
      throw new ModuleError(
        ErrorCodes.UNKNOWN_MODULE_TYPE,
        `Unimplemented module type: '${token}'`,
        { token }
      );
  }
}

/**
 * Find the module type whose prefix starts the given name, if any.
 */
export function moduleTypeFromPrefix(name: string): ModuleType | undefined {
  return MODULE_TYPES.find((type) => name.startsWith(MODULE_TYPE_INFO[type].prefix));
}

/**
 * Find the module type declared by a content-type attribute value.
 */
export function moduleTypeFromContentType(contentType: string): ModuleType | undefined {
  return MODULE_TYPES.find((type) => MODULE_TYPE_INFO[type].contentType === contentType);
}
