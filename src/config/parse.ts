export type Env = Record<string, string | undefined>;

export const parseNumberEnv = (env: Env, envKey: string, fallback: number): number => {
  const raw = env[envKey];
  if (raw === undefined || raw === null) {
    return fallback;
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    return fallback;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const parseListEnv = (env: Env, envKey: string, fallback: string[]): string[] => {
  const raw = env[envKey];
  if (!raw) {
    return [...fallback];
  }
  const entries = raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean);
  return entries.length > 0 ? Array.from(new Set(entries)) : [...fallback];
};

export const parseEnumEnv = <T extends string>(
  env: Env,
  envKey: string,
  allowed: readonly T[],
  fallback: T,
): T => {
  const raw = env[envKey]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return allowed.find((value) => value === raw) ?? fallback;
};

export const parseStringEnv = (env: Env, envKey: string): string | undefined => {
  const raw = env[envKey]?.trim();
  return raw ? raw : undefined;
};
