import { z } from 'zod';

/** How much diagnostic output the CLI prints. */
export const VerbositySchema = z.enum(['verbose', 'default', 'quiet']);

/**
 * Resolved, process-wide options.
 */
export const OptionsSchema = z.object({
  /** Emit guidance comments in generated files */
  comments: z.boolean().default(true),
  /** Prefix ids with the module-type prefix */
  prefixes: z.boolean().default(true),
  /** Append an example block to generated files */
  examples: z.boolean().default(true),
  /** Directory generated files are written to */
  targetDir: z.string().min(1).default('.'),
  verbosity: VerbositySchema.default('default'),
  /** Replace files that already exist */
  overwrite: z.boolean().default(false),
  /** Report what would be written without writing */
  dryRun: z.boolean().default(false),
  /** Exit non-zero when a validated file has an error */
  failOnInvalid: z.boolean().default(false),
});

/** A module title. It becomes a heading, so it must fit on one line. */
export const TitleSchema = z.string().regex(/^[^\r\n]*$/, 'Titles must fit on one line');

/**
 * The option bag commander hands to the action handler.
 * Negatable flags (`--no-comments`) arrive as `comments: false`.
 */
export const CliFlagsSchema = z.object({
  assembly: z.array(TitleSchema).default([]),
  concept: z.array(TitleSchema).default([]),
  procedure: z.array(TitleSchema).default([]),
  reference: z.array(TitleSchema).default([]),
  snippet: z.array(TitleSchema).default([]),
  includeIn: TitleSchema.optional(),
  validate: z.array(z.string()).default([]),
  comments: z.boolean().default(true),
  prefixes: z.boolean().default(true),
  examples: z.boolean().default(true),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  targetDir: z.string().min(1).default('.'),
  overwrite: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  failOnInvalid: z.boolean().default(false),
});

export type Verbosity = z.infer<typeof VerbositySchema>;
export type Options = Readonly<z.infer<typeof OptionsSchema>>;
export type CliFlags = z.infer<typeof CliFlagsSchema>;
