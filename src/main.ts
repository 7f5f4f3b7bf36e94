// imports
import dotenv from 'dotenv';
dotenv.config();

import { Redis } from 'ioredis';
import { match } from 'ts-pattern';
import { SimpleCache } from './cache/cache.ts';
import type { KeyValueConnector } from './cache/connector.ts';
import { MemoryConnector } from './cache/memory-connector.ts';
import { RedisConnector } from './cache/redis-connector.ts';
import { parseCliArgs } from './cli-args.ts';
import { loadConfig } from './config/load.ts';
import type { AppConfig } from './config/schema.ts';
import { explainTransaction } from './explain.ts';
import type { ProgressEvent } from './pipeline/progress.ts';
import { CoinGeckoPriceProvider } from './services/coingecko.ts';
import { ENS_NETWORK_ID, EnsNameResolver } from './services/ens.ts';
import type { NameResolver } from './services/interfaces.ts';
import { OpenAiChatClient } from './services/openai.ts';
import { JsonRpcClient } from './services/rpc.ts';
import { log } from './utils/logger.ts';

function renderProgress(event: ProgressEvent): void {
  const line = match(event)
    .with({ type: 'component_update' }, ({ component }) =>
      component.durationMs > 0
        ? `${component.title}: ${component.status} (${component.durationMs}ms)`
        : `${component.title}: ${component.status}`,
    )
    .with({ type: 'complete' }, () => 'done')
    .with({ type: 'error' }, ({ error }) => `failed: ${error}`)
    .exhaustive();
  log.debug(`[progress] ${line}`);
}

function pickNetwork(appCfg: AppConfig, requested?: number): number {
  const configured = Object.keys(appCfg.networks).map(Number);
  const networkId = requested ?? configured[0];
  if (!appCfg.networks[String(networkId)]) {
    throw new Error(
      `network ${networkId} is not configured; known networks: ${configured.join(', ')}`,
    );
  }
  return networkId;
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));

  // load config
  const appCfg = await loadConfig(args.configPath);
  if (appCfg.verbose && !process.env.LOG_LEVEL) process.env.LOG_LEVEL = 'debug';
  const networkId = pickNetwork(appCfg, args.networkId);

  // redis when configured, otherwise an in-process cache for this run only
  let redis: Redis | null = null;
  let connector: KeyValueConnector;
  if (appCfg.redisUrl) {
    redis = new Redis(appCfg.redisUrl);
    redis.on('error', (err) => {
      log.error('Redis connection error:', err);
      log.error('Are you sure you have redis running at your specified endpoint?');
      process.exit(1);
    });
    connector = new RedisConnector(redis);
  } else {
    log.info('no redisUrl configured, caching in memory');
    connector = new MemoryConnector();
  }
  const cache = new SimpleCache(connector, {
    prefix: appCfg.cache.prefix,
    defaultTtlMs: appCfg.cache.defaultTtl,
  });

  const rpcUrls: Record<number, string> = {};
  const platforms: Record<number, string> = {};
  for (const [id, network] of Object.entries(appCfg.networks)) {
    rpcUrls[Number(id)] = network.rpcUrl;
    if (network.coingeckoPlatform) platforms[Number(id)] = network.coingeckoPlatform;
  }
  const rpc = new JsonRpcClient({ rpcUrls });

  let names: NameResolver | undefined;
  if (appCfg.resolveNames) {
    if (appCfg.networks[String(ENS_NETWORK_ID)]) names = new EnsNameResolver(rpc);
    else log.warn(`resolveNames is set but network ${ENS_NETWORK_ID} is not configured; skipping names`);
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('interrupted')));

  try {
    const result = await explainTransaction(
      {
        cache,
        transactions: rpc,
        tokens: rpc,
        prices: new CoinGeckoPriceProvider({
          baseUrl: appCfg.coingecko.baseUrl,
          apiKey: appCfg.coingecko.apiKey,
          platforms,
          minTime: appCfg.coingecko.minTimeMs,
          maxRetries: appCfg.coingecko.maxRetries,
        }),
        llm: new OpenAiChatClient(appCfg.llm),
        names,
        progress: renderProgress,
        enforceDiscipline: appCfg.enforceDiscipline,
      },
      { txHash: args.txHash, networkId, signal: controller.signal },
    );

    process.stdout.write(
      JSON.stringify({
        txHash: result.txHash,
        networkId: result.networkId,
        explanation: result.explanation.summary,
        model: result.explanation.model,
        transfers: result.transfers,
        names: result.names,
        durationMs: result.report.durationMs,
      }) + '\n',
    );
  } finally {
    redis?.disconnect();
  }
}

main().catch((err) => {
  log.fatal('txgraph failed:', err);
  process.exit(1);
});
