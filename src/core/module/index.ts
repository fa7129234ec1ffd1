/**
 * Module exports barrel file.
 */
export { Input, createModule, includeStatement } from './module.js';
export type { ModuleOptions } from './module.js';
export { toId, moduleId, ID_SEPARATOR } from './id.js';
export {
  MODULE_EXTENSION,
  MODULE_TYPES,
  MODULE_TYPE_INFO,
  parseModuleType,
  moduleTypeFromPrefix,
  moduleTypeFromContentType,
} from './module-type.js';
export type { Module, ModuleType, ModuleTypeInfo } from './types.js';
