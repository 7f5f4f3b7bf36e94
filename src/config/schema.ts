// config/schema.ts
import { z } from 'zod';
import { durationHumanToMs } from './duration.ts';

const Url = z.url();

export const NetworkConfig = z.object({
  name: z.string().min(1),
  rpcUrl: Url,
  // CoinGecko asset platform id, e.g. "ethereum"; omit to skip pricing on this network
  coingeckoPlatform: z.string().min(1).optional(),
});
export type NetworkConfig = z.infer<typeof NetworkConfig>;

export const CacheConfig = z.object({
  prefix: z.string().default('txgraph'),
  defaultTtl: durationHumanToMs(0).default(0),
});

export const LlmConfig = z.object({
  apiKey: z.string().min(1),
  model: z.string().min(1).default('gpt-4o-mini'),
  baseUrl: Url.default('https://api.openai.com/v1'),
  maxTokens: z.number().int().positive().default(1024),
});
export type LlmConfig = z.infer<typeof LlmConfig>;

export const CoinGeckoConfig = z.object({
  apiKey: z.string().optional(),
  baseUrl: Url.default('https://api.coingecko.com/api/v3'),
  minTimeMs: z.number().int().nonnegative().default(1200),
  maxRetries: z.number().int().nonnegative().default(3),
});
export type CoinGeckoConfig = z.infer<typeof CoinGeckoConfig>;

export const AppConfig = z
  .object({
    // keyed by chain id, e.g. "1" or "8453"
    networks: z.record(z.string().regex(/^\d+$/, 'network ids must be numeric'), NetworkConfig),
    redisUrl: z.string().min(1).optional(),
    cache: CacheConfig.default({ prefix: 'txgraph', defaultTtl: 0 }),
    llm: LlmConfig,
    coingecko: CoinGeckoConfig.default({
      baseUrl: 'https://api.coingecko.com/api/v3',
      minTimeMs: 1200,
      maxRetries: 3,
    }),
    // ENS reverse lookups; needs network "1" configured
    resolveNames: z.boolean().default(true),
    verbose: z.boolean().default(false),
    enforceDiscipline: z.boolean().default(false),
  })
  .superRefine((cfg, ctx) => {
    if (Object.keys(cfg.networks).length === 0) {
      ctx.addIssue({
        code: 'custom',
        path: ['networks'],
        message: 'At least one network must be configured.',
      });
    }
  });
export type AppConfig = z.infer<typeof AppConfig>;
