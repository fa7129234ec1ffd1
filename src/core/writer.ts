/**
 * Writes generated modules to the target directory.
 */
import { join } from 'node:path';
import { SystemError, ErrorCodes } from '../utils/errors.js';
import { isAlreadyExists, writeFile } from '../utils/file-system.js';
import { logger as log } from '../utils/logger.js';
import { MODULE_TYPE_INFO } from './module/module-type.js';
import type { Module } from './module/types.js';
import type { Options } from './options/schema.js';

export type WriteOutcome = 'written' | 'skipped' | 'dry-run';

export interface WriteResult {
  /** Path the module was (or would be) written to */
  path: string;
  outcome: WriteOutcome;
}

/**
 * Write a module to `<targetDir>/<id>.adoc`.
 * An existing file is kept unless `overwrite` is set.
 */
export async function writeModule(
  module: Module,
  options: Pick<Options, 'targetDir' | 'overwrite' | 'dryRun'>
): Promise<WriteResult> {
  const filePath = join(options.targetDir, module.fileName);
  const label = MODULE_TYPE_INFO[module.moduleType].label;

  if (options.dryRun) {
    log.info(`Dry run: would write ${label.toLowerCase()} ${filePath}`);
    return { path: filePath, outcome: 'dry-run' };
  }

  try {
    await writeFile(filePath, module.content, { flag: options.overwrite ? 'w' : 'wx' });
  } catch (error) {
    if (isAlreadyExists(error)) {
      log.warn(`File ${filePath} already exists. Keeping it; use --overwrite to replace it.`);
      return { path: filePath, outcome: 'skipped' };
    }
    throw new SystemError(
      ErrorCodes.WRITE_FAILED,
      `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: filePath, moduleType: module.moduleType }
    );
  }

  log.success(`${label} file generated: ${filePath}`);
  return { path: filePath, outcome: 'written' };
}
