/**
 * Template rendering utility for prompts.
 * Supports Mustache-style variable interpolation: {{variableName}}
 *
 * Variables can contain:
 * - Simple strings, numbers and booleans
 * - Arrays (joined with newlines)
 *
 * Placeholders with no matching variable are left in the output verbatim.
 */

export type TemplateValue = string | number | boolean | readonly string[];

export type TemplateVariables = Record<string, TemplateValue>;

// Lazy match, so `{{ a }} and {{ b }}` yields two placeholders
const PLACEHOLDER = /\{\{(.*?)\}\}/g;

function formatValue(value: TemplateValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return value.join('\n');
}

/**
 * Renders a template string by replacing {{variableName}} placeholders with values.
 * Names are trimmed, so `{{ content }}` and `{{content}}` are the same placeholder.
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (match: string, variableName: string) => {
    const name = variableName.trim();
    if (!Object.hasOwn(variables, name)) {
      return match;
    }
    const value = variables[name];
    return value === undefined ? match : formatValue(value);
  });
}

/**
 * Whether the template references `name`, with or without inner whitespace.
 */
export function hasTemplateVariable(template: string, name: string): boolean {
  return extractTemplateVariables(template).includes(name);
}

/**
 * Extracts all variable names from a template string.
 *
 * @returns Unique variable names in order of first appearance
 */
export function extractTemplateVariables(template: string): string[] {
  const variables = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1]?.trim();
    if (name) {
      variables.add(name);
    }
  }
  return Array.from(variables);
}
