import { z } from 'zod';
import { ConfigError } from './errors.js';
import { BUFFER_CATEGORIES } from './memory/types.js';

const configSchema = z.object({
  sessionGapMinutes: z.coerce.number().positive().max(24 * 60).default(30),
  contextBudget: z.coerce.number().int().min(1).max(50).default(5),
  minConfidence: z.coerce.number().min(0).max(1).default(0.5),
  storeWarnBytes: z.coerce.number().int().min(1024).default(64 * 1024),
  promoteCategories: z.preprocess(
    (val) => typeof val === 'string' ? val.split(',').map(s => s.trim()).filter(Boolean) : val,
    z.array(z.enum(BUFFER_CATEGORIES)).min(1).default(['rejected', 'experience']),
  ),
  scanInline: z.preprocess(
    (val) => typeof val === 'string' ? ['1', 'true', 'yes'].includes(val.toLowerCase()) : val,
    z.boolean().default(false),
  ),
  mindDirName: z.string().min(1).default('.mind'),
  // Context ranking weights; recency always contributes in [0, 1]
  frequencyWeight: z.coerce.number().min(0).default(0.15),
  stackWeight: z.coerce.number().min(0).default(0.3),
  continuityWeight: z.coerce.number().min(0).default(0.5),
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  const raw = {
    sessionGapMinutes: process.env.MIND_SESSION_GAP_MINUTES || undefined,
    contextBudget: process.env.MIND_CONTEXT_BUDGET || undefined,
    minConfidence: process.env.MIND_MIN_CONFIDENCE || undefined,
    storeWarnBytes: process.env.MIND_STORE_WARN_BYTES || undefined,
    promoteCategories: process.env.MIND_PROMOTE_CATEGORIES || undefined,
    scanInline: process.env.MIND_SCAN_INLINE || undefined,
    mindDirName: process.env.MIND_DIR_NAME || undefined,
    frequencyWeight: process.env.MIND_FREQUENCY_WEIGHT || undefined,
    stackWeight: process.env.MIND_STACK_WEIGHT || undefined,
    continuityWeight: process.env.MIND_CONTINUITY_WEIGHT || undefined,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function getConfig(): Config {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/** Defaults with overrides, without reading the environment. */
export function defaultConfig(overrides: Partial<Config> = {}): Config {
  return { ...configSchema.parse({}), ...overrides };
}
