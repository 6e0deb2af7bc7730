/**
 * Minimal `{placeholder}` renderer for operator-configured reply templates.
 * Unknown placeholders are left as-is so a typo stays visible in the reply.
 */
export type TemplateVars = Record<string, string | number>;

export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? String(vars[key]) : match,
  );
}

/** Formats a display amount the way every reply shows quota. */
export function formatQuota(value: number): string {
  return value.toFixed(2);
}
