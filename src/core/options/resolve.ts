/**
 * Turns commander's option bag into the read-only Options snapshot and the
 * list of requested work.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { ModuleType } from '../module/types.js';
import {
  CliFlagsSchema,
  OptionsSchema,
  type CliFlags,
  type Options,
  type Verbosity,
} from './schema.js';

/**
 * What the user asked for on the command line.
 */
export interface Invocation {
  /** Titles per module type, in the order they were given */
  modules: Record<ModuleType, string[]>;
  /** Title of the populated assembly */
  includeIn?: string;
  /** File names to validate */
  validate: string[];
}

/**
 * Parse the raw option bag, failing with a ConfigError on bad input.
 */
export function parseCliFlags(raw: unknown): CliFlags {
  const result = CliFlagsSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const pathStr = issue.path.join('.');
      return pathStr ? `${pathStr}: ${issue.message}` : issue.message;
    });
    throw new ConfigError(
      ErrorCodes.INVALID_OPTIONS,
      `Invalid options: ${problems.join('; ')}`,
      { problems }
    );
  }
  return result.data;
}

function resolveVerbosity(flags: CliFlags): Verbosity {
  if (flags.verbose && flags.quiet) {
    throw new ConfigError(
      ErrorCodes.INVALID_OPTIONS,
      'Invalid options: --verbose and --quiet cannot be used together'
    );
  }
  if (flags.verbose) return 'verbose';
  if (flags.quiet) return 'quiet';
  return 'default';
}

/**
 * Build the frozen Options snapshot.
 */
export function resolveOptions(raw: unknown): Options {
  const flags = parseCliFlags(raw);
  const options = OptionsSchema.parse({
    comments: flags.comments,
    prefixes: flags.prefixes,
    examples: flags.examples,
    targetDir: flags.targetDir,
    verbosity: resolveVerbosity(flags),
    overwrite: flags.overwrite,
    dryRun: flags.dryRun,
    failOnInvalid: flags.failOnInvalid,
  });
  return Object.freeze(options);
}

/**
 * Extract the requested modules, populated assembly and validations.
 */
export function resolveInvocation(raw: unknown): Invocation {
  const flags = parseCliFlags(raw);
  return {
    modules: {
      assembly: [...flags.assembly],
      concept: [...flags.concept],
      procedure: [...flags.procedure],
      reference: [...flags.reference],
      snippet: [...flags.snippet],
    },
    includeIn: flags.includeIn,
    validate: [...flags.validate],
  };
}
