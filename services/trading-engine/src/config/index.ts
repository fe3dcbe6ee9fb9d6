/**
 * Configuration Management for the Trading Engine
 *
 * Environment variables are validated once at startup and grouped into
 * nested sections consumed by the individual engine components.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors';

// Load environment variables
dotenv.config();

const envBoolean = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true');

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim().toUpperCase())
        .filter((item) => item.length > 0)
    );

export const configSchema = z.object({
  env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  serviceName: z.string().default('trading-engine'),
  symbols: csv('BTCUSDT,ETHUSDT,SOLUSDT').pipe(z.array(z.string()).min(1)),

  // Risk limits (seed for the StateStore's RiskConfig)
  risk: z
    .object({
      dailyLossLimit: z.coerce.number().positive().default(200),
      maxRiskPerTrade: z.coerce.number().positive().default(100),
      maxConcurrentPositions: z.coerce.number().int().positive().default(5),
      maxSlippageBps: z.coerce.number().nonnegative().default(100),
      takeProfitBps: z.coerce.number().positive().default(50),
      stopLossBps: z.coerce.number().positive().default(25),
      dailyProfitTarget: z.coerce.number().positive().optional(),
      cooldownMs: z.coerce.number().int().nonnegative().default(60_000),
      allowPyramiding: envBoolean(false),
      liquidateOnHalt: envBoolean(true),
    })
    .default({}),

  // Order-book imbalance signal
  signal: z
    .object({
      depth: z.coerce.number().int().positive().default(5),
      longThreshold: z.coerce.number().min(0).max(1).default(0.2),
      shortThreshold: z.coerce.number().min(-1).max(0).default(-0.2),
    })
    .default({}),

  // Sentiment trend aggregation
  trend: z
    .object({
      feedMode: z.enum(['live', 'simulated']).default('simulated'),
      simulationSeed: z.coerce.number().int().default(42),
      stalenessWindowMs: z.coerce.number().int().positive().default(300_000),
      bufferCapacity: z.coerce.number().int().positive().default(200),
      recomputeIntervalMs: z.coerce.number().int().positive().default(5_000),
    })
    .default({}),

  // Signal fusion
  strategy: z
    .object({
      dominanceThreshold: z.coerce.number().min(0).max(1).default(0.6),
      trendThreshold: z.coerce.number().min(0).max(1).default(0.3),
      marketWeight: z.coerce.number().min(0).max(1).default(0.7),
      trendWeight: z.coerce.number().min(0).max(1).default(0.3),
      disagreementPenalty: z.coerce.number().min(0).max(1).default(0.5),
      baseOrderSize: z.coerce.number().positive().default(100),
    })
    .default({})
    .refine((s) => Math.abs(s.marketWeight + s.trendWeight - 1) < 1e-9, {
      message: 'strategy weights must sum to 1',
    }),

  // Order execution
  execution: z
    .object({
      maxAttempts: z.coerce.number().int().positive().default(4),
      minBackoffMs: z.coerce.number().int().nonnegative().default(250),
      maxBackoffMs: z.coerce.number().int().positive().default(5_000),
      fillTimeoutMs: z.coerce.number().int().positive().default(10_000),
      paperFeeBps: z.coerce.number().nonnegative().default(4),
    })
    .default({}),

  // State broadcasting and housekeeping
  monitoring: z
    .object({
      broadcastIntervalMs: z.coerce.number().int().positive().default(1_000),
      housekeepingIntervalMs: z.coerce.number().int().positive().default(1_000),
      historyLimit: z.coerce.number().int().positive().default(50),
    })
    .default({}),

  persistence: z
    .object({
      driver: z.enum(['memory', 'postgres']).default('memory'),
      databaseUrl: z.string().default('postgres://localhost:5432/perp_scalper'),
      maxConnections: z.coerce.number().int().positive().default(10),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
      format: z.enum(['pretty', 'json']).default('pretty'),
      fileEnabled: envBoolean(false),
      directory: z.string().default('logs'),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

// Maps flat environment variables onto the nested schema shape
const fromEnvironment = (env: Env) => ({
  env: env.NODE_ENV,
  serviceName: env.SERVICE_NAME,
  symbols: env.SYMBOLS,
  risk: {
    dailyLossLimit: env.RISK_DAILY_LOSS_LIMIT,
    maxRiskPerTrade: env.RISK_MAX_RISK_PER_TRADE,
    maxConcurrentPositions: env.RISK_MAX_CONCURRENT_POSITIONS,
    maxSlippageBps: env.RISK_MAX_SLIPPAGE_BPS,
    takeProfitBps: env.RISK_TAKE_PROFIT_BPS,
    stopLossBps: env.RISK_STOP_LOSS_BPS,
    dailyProfitTarget: env.RISK_DAILY_PROFIT_TARGET,
    cooldownMs: env.RISK_COOLDOWN_MS,
    allowPyramiding: env.RISK_ALLOW_PYRAMIDING,
    liquidateOnHalt: env.RISK_LIQUIDATE_ON_HALT,
  },
  signal: {
    depth: env.SIGNAL_DEPTH,
    longThreshold: env.SIGNAL_LONG_THRESHOLD,
    shortThreshold: env.SIGNAL_SHORT_THRESHOLD,
  },
  trend: {
    feedMode: env.TREND_FEED_MODE,
    simulationSeed: env.TREND_SIMULATION_SEED,
    stalenessWindowMs: env.TREND_STALENESS_WINDOW_MS,
    bufferCapacity: env.TREND_BUFFER_CAPACITY,
    recomputeIntervalMs: env.TREND_RECOMPUTE_INTERVAL_MS,
  },
  strategy: {
    dominanceThreshold: env.STRATEGY_DOMINANCE_THRESHOLD,
    trendThreshold: env.STRATEGY_TREND_THRESHOLD,
    marketWeight: env.STRATEGY_MARKET_WEIGHT,
    trendWeight: env.STRATEGY_TREND_WEIGHT,
    disagreementPenalty: env.STRATEGY_DISAGREEMENT_PENALTY,
    baseOrderSize: env.STRATEGY_BASE_ORDER_SIZE,
  },
  execution: {
    maxAttempts: env.EXECUTION_MAX_ATTEMPTS,
    minBackoffMs: env.EXECUTION_MIN_BACKOFF_MS,
    maxBackoffMs: env.EXECUTION_MAX_BACKOFF_MS,
    fillTimeoutMs: env.EXECUTION_FILL_TIMEOUT_MS,
    paperFeeBps: env.PAPER_FEE_BPS,
  },
  monitoring: {
    broadcastIntervalMs: env.BROADCAST_INTERVAL_MS,
    housekeepingIntervalMs: env.HOUSEKEEPING_INTERVAL_MS,
    historyLimit: env.STATE_HISTORY_LIMIT,
  },
  persistence: {
    driver: env.PERSISTENCE_DRIVER,
    databaseUrl: env.DATABASE_URL,
    maxConnections: env.DATABASE_MAX_CONNECTIONS,
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    fileEnabled: env.LOG_FILE_ENABLED,
    directory: env.LOG_DIRECTORY,
  },
});

export function loadConfig(env: Env = process.env): EngineConfig {
  const result = configSchema.safeParse(fromEnvironment(env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid engine configuration: ${details}`);
  }
  return result.data;
}

export const config = loadConfig();

export default config;
