/**
 * Environment variable expansion with defaults: `${VAR}` and `${VAR:-default}`.
 */

export type Env = Readonly<Record<string, string | undefined>>;

export function expandEnvVars(value: string, env: Env = process.env): string {
  return value.replace(/\$\{(\w+)(?::-(.*?))?\}/g, (_match, key: string, defaultVal: string | undefined) => {
    const resolved = env[key];
    return resolved !== undefined && resolved !== '' ? resolved : (defaultVal ?? '');
  });
}

export function expandEnvDeep(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') return expandEnvVars(obj, env);
  if (Array.isArray(obj)) return obj.map((item: unknown) => expandEnvDeep(item, env));
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = expandEnvDeep(val, env);
    }
    return result;
  }
  return obj;
}
