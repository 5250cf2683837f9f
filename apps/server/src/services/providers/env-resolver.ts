import type { ProviderConfig } from '@server/core/interfaces';

/**
 * `${NAME}` or `${NAME:-default}`. Names may not contain `}` or `:`.
 */
const PLACEHOLDER_PATTERN = /\$\{([^}:]+)(?::-([^}]*))?\}/g;

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ResolvedValue<T> {
  value: T;
  /** Variables that were unset and had no default; they resolve to ''. */
  missing: string[];
}

export function hasPlaceholders(value: string): boolean {
  PLACEHOLDER_PATTERN.lastIndex = 0;
  return PLACEHOLDER_PATTERN.test(value);
}

/**
 * Expand placeholders in one string against `env`.
 * An empty variable counts as set; only an absent one falls back to the default.
 */
export function resolveString(value: string, env: Environment = process.env): ResolvedValue<string> {
  const missing: string[] = [];

  const resolved = value.replace(
    PLACEHOLDER_PATTERN,
    (_match: string, name: string, fallback: string | undefined) => {
      const current = env[name];
      if (current !== undefined) {
        return current;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      missing.push(name);
      return '';
    }
  );

  return { value: resolved, missing };
}

export function resolveList(values: readonly string[], env: Environment = process.env): ResolvedValue<string[]> {
  const missing = new Set<string>();
  const value = values.map((item) => {
    const result = resolveString(item, env);
    result.missing.forEach((name) => missing.add(name));
    return result.value;
  });
  return { value, missing: [...missing] };
}

export function resolveRecord(
  values: Readonly<Record<string, string>>,
  env: Environment = process.env
): ResolvedValue<Record<string, string>> {
  const missing = new Set<string>();
  const value: Record<string, string> = {};
  for (const [key, item] of Object.entries(values)) {
    const result = resolveString(item, env);
    result.missing.forEach((name) => missing.add(name));
    value[key] = result.value;
  }
  return { value, missing: [...missing] };
}

/**
 * Copy of `config` with every connection parameter resolved. The stored
 * config is left untouched, so resolved secrets never reach the file.
 */
export function resolveProviderConfig(
  config: ProviderConfig,
  env: Environment = process.env
): ResolvedValue<ProviderConfig> {
  if (config.transport === 'stdio') {
    const command = resolveString(config.command, env);
    const args = resolveList(config.args, env);
    const vars = resolveRecord(config.env, env);
    const cwd = config.cwd !== undefined ? resolveString(config.cwd, env) : undefined;
    return {
      value: {
        ...config,
        command: command.value,
        args: args.value,
        env: vars.value,
        ...(cwd ? { cwd: cwd.value } : {}),
      },
      missing: unique([command.missing, args.missing, vars.missing, cwd?.missing ?? []]),
    };
  }

  const url = resolveString(config.url, env);
  const headers = resolveRecord(config.headers, env);
  return {
    value: { ...config, url: url.value, headers: headers.value },
    missing: unique([url.missing, headers.missing]),
  };
}

function unique(lists: string[][]): string[] {
  return [...new Set(lists.flat())];
}
