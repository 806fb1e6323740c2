export type TemplateValue = string | number | boolean | undefined;

const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g;
const CONDITIONAL_PATTERN = /\{\{#if\s+(\w+)\}\}([\s\S]*?)(?:\{\{else\}\}([\s\S]*?))?\{\{\/if\}\}/g;

/**
 * Replaces `{{key}}` with the matching value. Placeholders without an entry
 * in `data` are left as they are; `undefined` renders as an empty string.
 */
export function renderTemplate(template: string, data: Record<string, TemplateValue>): string {
  return template.replace(VARIABLE_PATTERN, (placeholder: string, key: string) => {
    if (!Object.hasOwn(data, key)) {
      return placeholder;
    }
    const value = data[key];
    return value !== undefined ? String(value) : "";
  });
}

/**
 * Conditional blocks: `{{#if key}}…{{/if}}` and `{{#if key}}…{{else}}…{{/if}}`.
 * Blocks do not nest.
 */
export function renderConditional(template: string, data: Record<string, unknown>): string {
  return template.replace(
    CONDITIONAL_PATTERN,
    (_block: string, key: string, whenTrue: string, whenFalse: string | undefined) => {
      const value = data[key];
      const truthy = Array.isArray(value) ? value.length > 0 : Boolean(value);
      return truthy ? whenTrue : (whenFalse ?? "");
    },
  );
}

/**
 * Conditionals first, then variable substitution of scalar values.
 */
export function render(template: string, data: Record<string, unknown>): string {
  const withBlocks = renderConditional(template, data);

  const scalars: Record<string, TemplateValue> = {};
  for (const [key, value] of Object.entries(data)) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean" ||
      value === undefined
    ) {
      scalars[key] = value;
    }
  }

  return renderTemplate(withBlocks, scalars);
}
