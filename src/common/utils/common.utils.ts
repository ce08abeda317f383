export async function sleepFor(ms: number) {
  await new Promise<void>(resolve => {
    setTimeout(() => resolve(), ms);
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Reads a dotted field path such as `responseData.translatedText` or
 * `sentences.0.trans` out of a parsed JSON document.
 */
export function getValueAtPath(document: unknown, path: string): unknown {
  let current: unknown = document;

  for (const segment of path.split(".").filter(Boolean)) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }

  return current;
}

/**
 * Substitutes `{name}` placeholders. Unknown placeholders are left as written.
 */
export function fillTemplate(
  template: string,
  values: Record<string, string>,
  encode: (value: string) => string = value => value
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? encode(values[name]) : placeholder
  );
}

/**
 * Applies {@link fillTemplate} to every string value of a flat parameter map.
 */
export function fillTemplateRecord(
  templates: Record<string, string | number | boolean>,
  values: Record<string, string>
): Record<string, string | number | boolean> {
  const filled: Record<string, string | number | boolean> = {};
  for (const [key, template] of Object.entries(templates)) {
    filled[key] = typeof template === "string" ? fillTemplate(template, values) : template;
  }
  return filled;
}
