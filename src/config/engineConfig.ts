import { z } from 'zod';
import engineJson from '@/content/engine.json';
import { ConfigurationError } from '@/core/errors';

const fraction = z.number().min(0).max(1);

const ThresholdPairSchema = z
  .object({
    moderate: fraction,
    severe: fraction,
  })
  .refine((pair) => pair.moderate <= pair.severe, {
    message: 'moderate threshold must not exceed severe threshold',
  });

export const PerformanceConfigSchema = z.object({
  alpha: z.number().gt(0).max(1),
  inCombat: ThresholdPairSchema,
  outOfCombat: ThresholdPairSchema,
  hitchFrameMs: z.number().positive(),
  hitchWorkMs: z.number().positive(),
  companionScanInterval: z.number().int().positive(),
  autoThrottle: z.boolean(),
});

export const EngineConfigSchema = z.object({
  cacheTtlMs: z.number().positive(),
  // power of two so the set index is a mask of the hash
  cacheSets: z
    .number()
    .int()
    .positive()
    .refine((n) => (n & (n - 1)) === 0, { message: 'cacheSets must be a power of two' }),
  weaveBudgetSeconds: z.number().nonnegative(),
  weaveLockSeconds: z.number().nonnegative(),
  weaveSafetySeconds: z.number().nonnegative(),
  maxSuggestions: z.number().int().min(0).max(8),
  maxAuxiliaryRules: z.number().int().positive(),
  hpThreshold: fraction,
  companionOverrideDelta: fraction,
  companionGraceFrames: z.number().int().nonnegative(),
  staleThresholdMs: z.number().positive(),
  maxActionId: z.number().int().positive(),
  lowResourceFraction: fraction,
  performance: PerformanceConfigSchema,
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type PerformanceConfig = z.infer<typeof PerformanceConfigSchema>;

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'performance'>> & {
  performance?: Partial<PerformanceConfig>;
};

let cachedConfig: EngineConfig | null = null;

function parseConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError('Invalid engine config', issues);
  }
  return result.data;
}

export function defaultEngineConfig(): EngineConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = parseConfig(engineJson);
  return cachedConfig;
}

export function loadEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const base = defaultEngineConfig();
  if (Object.keys(overrides).length === 0) {
    return base;
  }
  return parseConfig({
    ...base,
    ...overrides,
    performance: { ...base.performance, ...overrides.performance },
  });
}
