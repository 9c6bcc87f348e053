const DEFAULT_BURNIN = 0.2;

const env = ((): Record<string, string | undefined> => {
  if (typeof process !== "undefined" && process && process.env) {
    return process.env;
  }
  return {};
})();

export const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  if (value == null || !value.trim()) return fallback;
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

export const parseBoolean = (value: string | undefined, fallback = false): boolean => {
  if (value == null) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false;
  return fallback;
};

// Zero is a valid burn-in, so this one cannot go through parsePositiveNumber.
export const parseBurnin = (value: string | undefined, fallback = DEFAULT_BURNIN): number => {
  if (value == null || !value.trim()) return fallback;
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed >= 0 && parsed < 1) return parsed;
  return fallback;
};

export type MonophylyConfig = {
  burnin: number;
  rooted: boolean;
  cacheDbPath: string | null;
  cacheTtlHours: number;
};

export const loadConfig = (source: Record<string, string | undefined> = env): MonophylyConfig => ({
  burnin: parseBurnin(source.MONOPHYLY_BURNIN),
  rooted: parseBoolean(source.MONOPHYLY_ROOTED, false),
  cacheDbPath: source.MONOPHYLY_CACHE_DB?.trim() || null,
  cacheTtlHours: parsePositiveNumber(source.MONOPHYLY_CACHE_TTL_HOURS, 0),
});

export const config: MonophylyConfig = loadConfig();
