/**
 * Drives one run: collect modules, write them, write the populated assembly,
 * then validate. Phases run once each, in that order, and the first fatal
 * error ends the run.
 */
import { ModuleError, ErrorCodes } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';
import { Input, createModule } from './module/module.js';
import { MODULE_TYPES, parseModuleType } from './module/module-type.js';
import type { Module } from './module/types.js';
import type { Invocation } from './options/resolve.js';
import type { Options } from './options/schema.js';
import { validateFile } from './validation/file-validator.js';
import type { FileValidationResult } from './validation/types.js';
import { writeModule, type WriteResult } from './writer.js';

export interface RunResult {
  /** Modules requested directly, in command-line order */
  modules: Module[];
  /** The assembly that includes all other modules, if requested */
  populated?: Module;
  writes: WriteResult[];
  validations: FileValidationResult[];
}

function assertUniqueId(module: Module, others: readonly Module[]): void {
  const clash = others.find((other) => other.id === module.id);
  if (clash) {
    throw new ModuleError(
      ErrorCodes.DUPLICATE_MODULE_ID,
      `'${clash.title}' and '${module.title}' both map to id '${module.id}'`,
      { id: module.id, titles: [clash.title, module.title] }
    );
  }
}

/**
 * Build every requested module, grouped by type in flag order.
 * Two titles that map to the same id are rejected.
 */
export function collectModules(invocation: Invocation, options: Options): Module[] {
  const modules: Module[] = [];
  for (const moduleType of MODULE_TYPES) {
    for (const title of invocation.modules[moduleType]) {
      const module = createModule(moduleType, title, options);
      assertUniqueId(module, modules);
      modules.push(module);
    }
  }
  return modules;
}

/**
 * Build the assembly that includes the given modules.
 * Its id must differ from theirs.
 */
export function populateAssembly(title: string, modules: Module[], options: Options): Module {
  const statements = modules.map((module) => module.includeStatement);
  if (statements.length === 0) {
    throw new ModuleError(
      ErrorCodes.EMPTY_POPULATED_ASSEMBLY,
      `Assembly '${title}' has no modules to include`,
      { title }
    );
  }

  const assembly = new Input(parseModuleType('include-in'), title, options)
    .include(statements)
    .toModule();
  assertUniqueId(assembly, modules);
  return assembly;
}

export async function run(options: Options, invocation: Invocation): Promise<RunResult> {
  log.debug('Active options', { ...options });

  const modules = collectModules(invocation, options);
  log.debug(`Collected ${modules.length} module(s)`);

  // Built before any write so an id clash leaves the disk untouched.
  const populated = invocation.includeIn !== undefined
    ? populateAssembly(invocation.includeIn, modules, options)
    : undefined;

  const writes: WriteResult[] = [];
  for (const module of modules) {
    writes.push(await writeModule(module, options));
  }
  if (populated) {
    writes.push(await writeModule(populated, options));
  }

  const validations: FileValidationResult[] = [];
  for (const file of invocation.validate) {
    log.debug(`Validating ${file}`);
    validations.push(await validateFile(file));
  }

  return { modules, populated, writes, validations };
}
