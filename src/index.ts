/**
 * modkit - scaffolding for modular AsciiDoc documentation.
 * Main library exports barrel file.
 */

// Modules
export * from './core/module/index.js';

// Templates
export * from './core/templates/index.js';

// Options
export * from './core/options/index.js';

// Validation
export * from './core/validation/index.js';

// Writing and orchestration
export { writeModule } from './core/writer.js';
export type { WriteResult, WriteOutcome } from './core/writer.js';
export { run, collectModules, populateAssembly } from './core/orchestrator.js';
export type { RunResult } from './core/orchestrator.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli, runCli } from './cli/index.js';
