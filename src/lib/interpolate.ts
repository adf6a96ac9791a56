const PLACEHOLDER_PATTERN = /(\\)?{{\s*([\w.]+)\s*}}/g;

/**
 * Replaces `{{key}}` placeholders in a template with values from `params`.
 *
 * - Dotted keys walk nested objects: `{{rapp.name}}`
 * - Missing or null values render as `fallback`
 * - A leading backslash escapes the placeholder: `\{{key}}` renders `{{key}}`
 *
 * ```typescript
 * interpolate('Starting rapp {{name}}', { name: 'nav_app' });
 * // => 'Starting rapp nav_app'
 * ```
 */
export function interpolate(
  template: string,
  params: Record<string, unknown> = {},
  fallback = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(
    PLACEHOLDER_PATTERN,
    (match: string, escape: string | undefined, key: string) => {
      if (escape) {
        return match.slice(1);
      }

      const value = lookup(params, key);

      if (value === undefined || value === null) {
        return fallback;
      }

      return stringifyParam(value);
    },
  );
}

function lookup(params: Record<string, unknown>, key: string): unknown {
  let current: unknown = params;

  for (const part of key.split('.')) {
    if (
      current === null ||
      typeof current !== 'object' ||
      !(part in current)
    ) {
      return undefined;
    }

    current = Reflect.get(current, part);
  }

  return current;
}

function stringifyParam(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }

  if (Array.isArray(value)) {
    return value.map((item) => stringifyParam(item)).join(', ');
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}
