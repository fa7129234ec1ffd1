/**
 * Module construction. Pure: nothing here touches the file system.
 */
import { ModuleError, ErrorCodes } from '../../utils/errors.js';
import type { Options } from '../options/schema.js';
import { renderModule } from '../templates/renderer.js';
import { moduleId } from './id.js';
import { MODULE_EXTENSION, MODULE_TYPE_INFO } from './module-type.js';
import type { Module, ModuleType } from './types.js';

/** The options that shape a generated module. */
export type ModuleOptions = Pick<Options, 'comments' | 'prefixes' | 'examples'>;

/**
 * Build the directive that includes a module with the given id.
 *
 * @example
 * includeStatement('concept', 'con_alpha') // 'include::modules/con_alpha.adoc[leveloffset=+1]'
 */
export function includeStatement(moduleType: ModuleType, id: string): string {
  const target = `${MODULE_TYPE_INFO[moduleType].includeDir}/${id}${MODULE_EXTENSION}`;
  // Snippets have no heading to offset.
  return moduleType === 'snippet' ? `include::${target}[]` : `include::${target}[leveloffset=+1]`;
}

/**
 * A requested module before it is rendered.
 */
export class Input {
  constructor(
    readonly moduleType: ModuleType,
    readonly title: string,
    readonly options: ModuleOptions,
    readonly includes: readonly string[] = []
  ) {}

  /**
   * Return a copy of this input that renders the given include statements.
   * Only assemblies include other modules.
   */
  include(statements: readonly string[]): Input {
    if (this.moduleType !== 'assembly') {
      throw new ModuleError(
        ErrorCodes.INCLUDES_ON_NON_ASSEMBLY,
        `Only assemblies can include other modules, got a ${MODULE_TYPE_INFO[this.moduleType].label.toLowerCase()}`,
        { moduleType: this.moduleType, title: this.title }
      );
    }
    return new Input(this.moduleType, this.title, this.options, [...statements]);
  }

  toModule(): Module {
    const id = moduleId(this.moduleType, this.title, this.options);
    const content = renderModule({
      moduleType: this.moduleType,
      id,
      title: this.title,
      options: this.options,
      includes: this.includes,
    });

    return Object.freeze({
      moduleType: this.moduleType,
      title: this.title,
      id,
      fileName: `${id}${MODULE_EXTENSION}`,
      content,
      includeStatement: includeStatement(this.moduleType, id),
    });
  }
}

/**
 * Create a module of the given type from a title.
 */
export function createModule(
  moduleType: ModuleType,
  title: string,
  options: ModuleOptions
): Module {
  return new Input(moduleType, title, options).toModule();
}
