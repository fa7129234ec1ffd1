/**
 * Options exports barrel file.
 */
export {
  OptionsSchema,
  CliFlagsSchema,
  VerbositySchema,
  TitleSchema,
} from './schema.js';
export type { Options, CliFlags, Verbosity } from './schema.js';
export {
  parseCliFlags,
  resolveOptions,
  resolveInvocation,
} from './resolve.js';
export type { Invocation } from './resolve.js';
