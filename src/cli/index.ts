import { Command, InvalidArgumentError, Option } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { run } from '../core/orchestrator.js';
import { resolveInvocation, resolveOptions, type Invocation } from '../core/options/index.js';
import { MODULE_TYPES } from '../core/module/module-type.js';
import { ConfigError, ErrorCodes } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';
import { ValidationFormatter } from './formatters/validation.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
const VERSION = pkg.version;

function checkTitle(value: string): string {
  if (value.trim() === '') {
    throw new InvalidArgumentError('The title must not be empty.');
  }
  if (/[\r\n]/.test(value)) {
    throw new InvalidArgumentError('The title must fit on one line.');
  }
  return value;
}

function collectTitle(value: string, previous: string[]): string[] {
  return [...previous, checkTitle(value)];
}

function collectFile(value: string, previous: string[]): string[] {
  if (value === '') {
    throw new InvalidArgumentError('The file name must not be empty.');
  }
  return [...previous, value];
}

/**
 * Reject invocations that request nothing, or a populated assembly with
 * nothing to include.
 */
export function checkInvocation(invocation: Invocation): void {
  const hasModules = MODULE_TYPES.some((type) => invocation.modules[type].length > 0);

  if (invocation.includeIn !== undefined && !hasModules) {
    throw new ConfigError(
      ErrorCodes.INVALID_OPTIONS,
      '--include-in requires at least one of --assembly, --concept, --procedure, --reference or --snippet'
    );
  }

  if (!hasModules && invocation.validate.length === 0) {
    throw new ConfigError(
      ErrorCodes.INVALID_OPTIONS,
      'Nothing to do: request at least one module or a file to --validate'
    );
  }
}

/**
 * Run with commander's parsed option bag. Returns the process exit code.
 */
export async function runCli(flags: unknown): Promise<number> {
  const options = resolveOptions(flags);
  log.setVerbosity(options.verbosity);

  const invocation = resolveInvocation(flags);
  checkInvocation(invocation);

  const result = await run(options, invocation);

  if (result.validations.length > 0) {
    console.log(new ValidationFormatter().formatBatch(result.validations));
  }

  const invalid = result.validations.some((v) => v.status === 'fail');
  return options.failOnInvalid && invalid ? 1 : 0;
}

/** Create the CLI program. */
export function createCli(): Command {
  return new Command()
    .name('modkit')
    .description('Generate pre-populated modular AsciiDoc documentation files')
    .version(VERSION)
    .option('-a, --assembly <title>', 'Create an assembly file', collectTitle, [])
    .option('-c, --concept <title>', 'Create a concept module', collectTitle, [])
    .option('-p, --procedure <title>', 'Create a procedure module', collectTitle, [])
    .option('-r, --reference <title>', 'Create a reference module', collectTitle, [])
    .option('-s, --snippet <title>', 'Create a snippet file', collectTitle, [])
    .option('-i, --include-in <title>', 'Create an assembly that includes the other generated modules', checkTitle)
    .option('-l, --validate <file>', 'Validate the name and header of an existing file', collectFile, [])
    .option('-C, --no-comments', 'Generate files without explanatory comments')
    .option('-P, --no-prefixes', 'Do not use module type prefixes in IDs and file names')
    .option('-E, --no-examples', 'Generate files without example content')
    .option('-T, --target-dir <directory>', 'Save the generated files in this directory', '.')
    .option('--overwrite', 'Replace files that already exist')
    .option('--dry-run', 'Show what would be written without writing')
    .option('--fail-on-invalid', 'Exit with status 1 when a validated file has errors')
    .addOption(new Option('-v, --verbose', 'Display additional debug messages').conflicts('quiet'))
    .addOption(new Option('-q, --quiet', 'Hide info-level messages').conflicts('verbose'))
    .action(async (flags: unknown) => {
      let exitCode: number;
      try {
        exitCode = await runCli(flags);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        exitCode = 1;
      }
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}
