/**
 * Renders the file body of a module.
 */
import type { Options } from '../options/schema.js';
import type { ModuleType } from '../module/types.js';
import { MODULE_EXTENSION, MODULE_TYPE_INFO } from '../module/module-type.js';
import { applyTemplate } from './template-engine.js';
import { MODULE_TEMPLATES } from './defaults.js';

export interface RenderInput {
  moduleType: ModuleType;
  id: string;
  title: string;
  options: Pick<Options, 'comments' | 'examples'>;
  /** Include statements inserted into an assembly, in order */
  includes?: readonly string[];
}

export function renderModule(input: RenderInput): string {
  const { moduleType, id, title, options, includes = [] } = input;

  return applyTemplate(MODULE_TEMPLATES[moduleType], {
    ID: id,
    TITLE: title,
    FILE_NAME: `${id}${MODULE_EXTENSION}`,
    CONTENT_TYPE: MODULE_TYPE_INFO[moduleType].contentType,
    COMMENTS: options.comments,
    EXAMPLES: options.examples,
    INCLUDES: [...includes],
  });
}
