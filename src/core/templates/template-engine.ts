/**
 * Handlebars-style substitution for module templates.
 *
 * Supports:
 * - {{VARIABLE}} - Simple substitution (arrays are joined one per line)
 * - {{#if VAR}}...{{/if}} - Conditional blocks
 *
 * A line break directly after a block tag belongs to the tag, so a tag on a
 * line of its own leaves no blank line behind. Blocks do not nest.
 */

export interface TemplateContext {
  [key: string]: string | string[] | boolean | undefined;
}

function isTruthy(value: TemplateContext[string]): boolean {
  return value !== undefined && value !== false && value !== '' &&
    !(Array.isArray(value) && value.length === 0);
}

/**
 * Process {{#if VAR}}...{{/if}} blocks.
 */
function processConditionals(template: string, context: TemplateContext): string {
  const ifPattern = /\{\{#if\s+(\w+)\}\}\n?([\s\S]*?)\{\{\/if\}\}\n?/g;

  return template.replace(ifPattern, (_, varName: string, content: string) =>
    isTruthy(context[varName]) ? content : ''
  );
}

/**
 * Process simple {{VARIABLE}} substitutions.
 * Inserted values are not scanned again.
 */
function processVariables(template: string, context: TemplateContext): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_, varName: string) => {
    const value = context[varName];
    if (value === undefined) {
      return '';
    }
    if (Array.isArray(value)) {
      return value.join('\n');
    }
    return String(value);
  });
}

/**
 * Render a template against a context.
 * The result is trimmed and ends with a single newline.
 */
export function applyTemplate(template: string, context: TemplateContext): string {
  let result = processConditionals(template, context);

  // Clean up excessive blank lines
  result = result.replace(/\n{3,}/g, '\n\n');

  result = processVariables(result, context);

  return result.trim() + '\n';
}
