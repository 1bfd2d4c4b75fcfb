import { z } from 'zod';
import { ConfigurationError } from '../errors';

/**
 * Engine configuration.
 *
 * Loaded from environment variables with defaults and validated once;
 * a bad value fails at load time rather than mid-evaluation.
 */

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export const EngineConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  gate: z.object({
    maxDepth: z.number().int().positive().default(5),
    maxComplexity: z.number().int().positive().default(20),
  }).default({}),
  history: z.object({
    enabled: z.boolean().default(true),
  }).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type LogLevel = EngineConfig['logLevel'];

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): EngineConfig {
  const raw = {
    logLevel: env.STAGEGATE_LOG_LEVEL?.toLowerCase(),
    gate: {
      maxDepth: toInt(env.STAGEGATE_GATE_MAX_DEPTH),
      maxComplexity: toInt(env.STAGEGATE_GATE_MAX_COMPLEXITY),
    },
    history: {
      enabled: toBool(env.STAGEGATE_HISTORY),
    },
  };

  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid engine configuration: ${problems.join('; ')}`, {
      issues: problems,
    });
  }
  return result.data;
}

function toInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is left for zod to reject
  return Number(value);
}

function toBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  throw new ConfigurationError(`Invalid boolean value for STAGEGATE_HISTORY: '${value}'`);
}

let cached: EngineConfig | undefined;

/**
 * Process-wide configuration, loaded lazily from process.env.
 */
export function getConfig(): EngineConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

export function resetConfig(config?: EngineConfig): void {
  cached = config;
}
