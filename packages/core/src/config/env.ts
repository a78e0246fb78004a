export function envString(
  key: string,
  fallback = "",
  env: NodeJS.ProcessEnv = process.env,
): string {
  return env[key]?.trim() ?? fallback;
}

/** True when any of `keys` holds a non-blank value. */
export function envHasAny(keys: readonly string[], env: NodeJS.ProcessEnv = process.env): boolean {
  return keys.some((key) => (env[key]?.trim() ?? "").length > 0);
}
