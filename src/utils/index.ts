export * from './fileUtils.js';
export * from './validation.js';
export * from './normalize.js';

/**
 * Replace template variables in a string
 */
export function replaceTemplateVariables(template: string, variables: Record<string, string>): string {
  // Single pass, so values that contain placeholders are left untouched
  return template.replace(/\{\{([a-zA-Z][a-zA-Z0-9_]*)\}\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] ?? placeholder : placeholder
  );
}

/**
 * Extract template variables from a template string
 */
export function extractTemplateVariables(template: string): string[] {
  const matches = template.match(/\{\{([a-zA-Z][a-zA-Z0-9_]*)\}\}/g) || [];
  return matches.map(match => match.slice(2, -2)).filter((value, index, self) => self.indexOf(value) === index);
}
