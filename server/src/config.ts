import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { DEFAULT_STYLES_PATH } from './styles.js';

const probability = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8081),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  BASE_SWING_CAP: positiveInt.default(3),
  STYLE_LOCK_MS: positiveInt.default(10_000),
  SWING_PHASE_MS: positiveInt.default(30_000),
  MAX_ROUNDS: positiveInt.default(20),
  DEFAULT_HIT_CHANCE: probability.default(0.65),
  DEFAULT_CRIT_RATE: probability.default(0.1),
  RATE_LIMIT_TOKENS: positiveInt.default(20),
  RATE_LIMIT_WINDOW_MS: positiveInt.default(10_000),
  STYLES_PATH: z.string().min(1).default(fileURLToPath(DEFAULT_STYLES_PATH))
});

export interface EngineConfig {
  baseSwingCap: number;
  styleLockMs: number;
  swingPhaseMs: number;
  maxRounds: number;
  defaultHitChance: number;
  defaultCritRate: number;
}

export interface ServerConfig {
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  stylesPath: string;
  rateLimit: { tokens: number; windowMs: number };
  engine: EngineConfig;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  baseSwingCap: 3,
  styleLockMs: 10_000,
  swingPhaseMs: 30_000,
  maxRounds: 20,
  defaultHitChance: 0.65,
  defaultCritRate: 0.1
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const env = envSchema.parse(source);
  return {
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    stylesPath: env.STYLES_PATH,
    rateLimit: { tokens: env.RATE_LIMIT_TOKENS, windowMs: env.RATE_LIMIT_WINDOW_MS },
    engine: {
      baseSwingCap: env.BASE_SWING_CAP,
      styleLockMs: env.STYLE_LOCK_MS,
      swingPhaseMs: env.SWING_PHASE_MS,
      maxRounds: env.MAX_ROUNDS,
      defaultHitChance: env.DEFAULT_HIT_CHANCE,
      defaultCritRate: env.DEFAULT_CRIT_RATE
    }
  };
}
