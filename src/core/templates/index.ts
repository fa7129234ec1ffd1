/**
 * Template exports barrel file.
 */
export { applyTemplate } from './template-engine.js';
export type { TemplateContext } from './template-engine.js';
export { renderModule } from './renderer.js';
export type { RenderInput } from './renderer.js';
export { MODULE_TEMPLATES, EXAMPLE_MARKER } from './defaults.js';
