import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
  JWT_SECRET: z.string().min(1).default('development-secret'),
  ADMIN_IDENTITY: z.string().min(1).default('admin'),
  CONTRIBUTION_REWARD: z.coerce.number().int().min(0).default(10),
  STATE_FILE: optionalString,
  CONTENT_STORE_URL: optionalString,
  CONTENT_STORE_AGGREGATOR_URL: optionalString,
  CONTENT_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CONTENT_STORE_RETRIES: z.coerce.number().int().min(0).default(3),
  BLOCKCHAIN_RPC_URL: optionalString,
  CONTRACT_ADDRESS: optionalString,
  BLOCKCHAIN_PRIVATE_KEY: optionalString,
  BLOCKCHAIN_SIMULATION: booleanFlag.default('true'),
  RATE_LIMIT_POINTS: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_DURATION: z.coerce.number().int().positive().default(60),
  REDIS_URL: optionalString
});

export interface CoordinatorConfig {
  port: number;
  allowedOrigins: string[];
  jwtSecret: string;
  adminIdentity: string;
  contributionReward: number;
  stateFile?: string;
  contentStore: {
    publisherUrl?: string;
    aggregatorUrl?: string;
    timeoutMs: number;
    retries: number;
  };
  chain: {
    rpcUrl?: string;
    contractAddress?: string;
    privateKey?: string;
    simulation: boolean;
  };
  rateLimit: {
    points: number;
    duration: number;
    redisUrl?: string;
  };
}

/**
 * Parse the process environment (or a supplied map) into a typed config.
 * Throws a `ZodError` listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
  const parsed = EnvSchema.parse(env);

  return {
    port: parsed.PORT,
    allowedOrigins: parsed.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    jwtSecret: parsed.JWT_SECRET,
    adminIdentity: parsed.ADMIN_IDENTITY,
    contributionReward: parsed.CONTRIBUTION_REWARD,
    stateFile: parsed.STATE_FILE,
    contentStore: {
      publisherUrl: parsed.CONTENT_STORE_URL,
      aggregatorUrl: parsed.CONTENT_STORE_AGGREGATOR_URL ?? parsed.CONTENT_STORE_URL,
      timeoutMs: parsed.CONTENT_STORE_TIMEOUT_MS,
      retries: parsed.CONTENT_STORE_RETRIES
    },
    chain: {
      rpcUrl: parsed.BLOCKCHAIN_RPC_URL,
      contractAddress: parsed.CONTRACT_ADDRESS,
      privateKey: parsed.BLOCKCHAIN_PRIVATE_KEY,
      simulation: parsed.BLOCKCHAIN_SIMULATION
    },
    rateLimit: {
      points: parsed.RATE_LIMIT_POINTS,
      duration: parsed.RATE_LIMIT_DURATION,
      redisUrl: parsed.REDIS_URL
    }
  };
}
