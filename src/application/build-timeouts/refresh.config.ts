export type RefreshConfig = {
  concurrency: number;
};

export type RefreshConfigInput = Partial<RefreshConfig>;

export const defaultRefreshConfig: RefreshConfig = {
  concurrency: 10
};

export const refreshCaps = {
  concurrency: { min: 1, max: 50 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateRefreshConfig = (config: RefreshConfig): RefreshConfig => {
  assertIntegerInRange("concurrency", config.concurrency, refreshCaps.concurrency.min, refreshCaps.concurrency.max);
  return config;
};

export const resolveRefreshConfig = (input: RefreshConfigInput = {}): RefreshConfig =>
  validateRefreshConfig({
    ...defaultRefreshConfig,
    ...input
  });
