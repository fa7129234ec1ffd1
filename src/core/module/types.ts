/**
 * Module type definitions.
 */

export type ModuleType = 'assembly' | 'concept' | 'procedure' | 'reference' | 'snippet';

/**
 * Fixed per-type naming and rendering facts.
 */
export interface ModuleTypeInfo {
  /** Human-readable name */
  label: string;
  /** File-name prefix, including its trailing underscore */
  prefix: string;
  /** Value of the `:_mod-docs-content-type:` attribute */
  contentType: string;
  /** Directory other files use to include this module */
  includeDir: string;
}

/**
 * A generated documentation module. Never mutated after creation.
 */
export interface Module {
  readonly moduleType: ModuleType;
  readonly title: string;
  /** File-name stem and anchor base */
  readonly id: string;
  /** `id` plus the module extension */
  readonly fileName: string;
  /** Fully rendered file body */
  readonly content: string;
  /** Directive another module uses to include this one */
  readonly includeStatement: string;
}
