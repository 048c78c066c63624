export type Environment = Record<string, string | undefined>;

/**
 * Interpolate ${ENV.NAME} and ${ENV.NAME:-default} in a string.
 * Unset variables without a default become the empty string.
 */
export function interpolate(template: string, env: Environment = process.env): string {
  return template.replace(
    /\$\{ENV\.(\w+)(?::-([^}]*))?\}/g,
    (_match, name: string, fallback: string | undefined) => {
      const value = env[name];
      if (value !== undefined && value !== '') {
        return value;
      }
      return fallback ?? '';
    }
  );
}

/**
 * Interpolate every string inside a value (string, array, object, or primitive)
 */
export function interpolateValue(value: unknown, env: Environment = process.env): unknown {
  if (typeof value === 'string') {
    return interpolate(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateValue(item, env));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = interpolateValue(item, env);
    }
    return result;
  }
  return value;
}
