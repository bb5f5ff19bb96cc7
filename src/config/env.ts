/**
 * Environment readers behind {@link loadMetricsConfig}. Values are trimmed,
 * blanks count as unset and literals outside an allow-list are ignored so the
 * caller's default applies.
 */

/** Variables the readers look at; `process.env` unless a test supplies its own. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trimmed value of `name`, or `undefined` when unset or blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  const trimmed = env[name]?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Canonical member of `allowed` matching `name` case-insensitively, or
 * `undefined` when the variable is unset, blank or not in the list.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const value = readOptionalString(name, env)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === value);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
