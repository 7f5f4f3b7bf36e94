import { z } from 'zod';
import { bytes32ToString, functions as erc20, legacyFunctions } from '../abi/erc20.ts';
import {
  RawBlock,
  RawLog,
  RawReceipt,
  type RawTransactionData,
  type TokenMetadata,
} from '../types/transaction.ts';
import { fetchWithRetry } from '../utils/fetchWithRetry.ts';
import { log as rootLog, type Logger } from '../utils/logger.ts';
import type { FetchLike, TokenMetadataSource, TransactionSource } from './interfaces.ts';

const RpcEnvelope = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.number(), z.string()]),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

const ReceiptWithLogs = RawReceipt.extend({ logs: z.array(RawLog) });

export class JsonRpcError extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(`RPC error ${code}: ${message}`);
    this.name = 'JsonRpcError';
  }
}

export interface JsonRpcClientOptions {
  /** chain id → endpoint */
  rpcUrls: Record<number, string>;
  fetch?: FetchLike;
  maxRetries?: number;
  initialBackoffMs?: number;
  log?: Logger;
}

export class JsonRpcClient implements TransactionSource, TokenMetadataSource {
  private readonly rpcUrls: Record<number, string>;
  private readonly fetchImpl: FetchLike;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly log: Logger;
  private nextId = 1;

  constructor(opts: JsonRpcClientOptions) {
    this.rpcUrls = opts.rpcUrls;
    this.fetchImpl = opts.fetch ?? fetch;
    this.maxRetries = opts.maxRetries ?? 3;
    this.initialBackoffMs = opts.initialBackoffMs ?? 500;
    this.log = opts.log ?? rootLog.child('rpc');
  }

  async call<T>(
    networkId: number,
    method: string,
    params: unknown[],
    schema: z.ZodType<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const url = this.rpcUrls[networkId];
    if (!url) throw new Error(`no RPC endpoint configured for network ${networkId}`);

    const body = JSON.stringify({ jsonrpc: '2.0', id: this.nextId++, method, params });
    const response = await fetchWithRetry(
      () =>
        this.fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal,
        }),
      this.maxRetries,
      this.initialBackoffMs,
      signal,
    );
    if (!response.ok) {
      throw new Error(`${method} failed with HTTP ${response.status}`);
    }

    const envelope = RpcEnvelope.parse(await response.json());
    if (envelope.error) throw new JsonRpcError(envelope.error.code, envelope.error.message);

    const parsed = schema.safeParse(envelope.result);
    if (!parsed.success) {
      throw new Error(`unexpected ${method} result: ${z.prettifyError(parsed.error)}`);
    }
    return parsed.data;
  }

  async fetchTransaction(
    networkId: number,
    txHash: string,
    signal?: AbortSignal,
  ): Promise<RawTransactionData> {
    const receipt = await this.call(
      networkId,
      'eth_getTransactionReceipt',
      [txHash],
      ReceiptWithLogs.nullable(),
      signal,
    );
    if (!receipt) {
      throw new Error(`transaction ${txHash} not found on network ${networkId}`);
    }

    let block: RawBlock | undefined;
    if (receipt.blockNumber) {
      const fetched = await this.call(
        networkId,
        'eth_getBlockByNumber',
        [receipt.blockNumber, false],
        RawBlock.nullable(),
        signal,
      );
      block = fetched ?? undefined;
    }

    const { logs, ...rest } = receipt;
    return { txHash, networkId, receipt: rest, logs, block };
  }

  async getTokenMetadata(
    networkId: number,
    address: string,
    signal?: AbortSignal,
  ): Promise<TokenMetadata | null> {
    const [name, symbol, decimals] = await Promise.all([
      this.ethCall(networkId, address, erc20.name.encode({}), signal),
      this.ethCall(networkId, address, erc20.symbol.encode({}), signal),
      this.ethCall(networkId, address, erc20.decimals.encode({}), signal),
    ]);

    const decodedName = name === null ? null : this.decodeText('name', address, name);
    const decodedSymbol = symbol === null ? null : this.decodeText('symbol', address, symbol);
    const decodedDecimals = decimals === null ? null : this.decodeDecimals(address, decimals);
    if (decodedName === null && decodedSymbol === null && decodedDecimals === null) return null;

    return {
      address: address.toLowerCase(),
      name: decodedName ?? 'Unknown Token',
      symbol: decodedSymbol ?? 'UNKNOWN',
      decimals: decodedDecimals ?? 0,
      type: decodedDecimals !== null ? 'ERC20' : 'unknown',
    };
  }

  /**
   * Raw `eth_call` against the latest block. A revert or an empty result
   * means the contract lacks the method and reads as null; transport and
   * HTTP failures still throw.
   */
  async ethCall(
    networkId: number,
    to: string,
    data: string,
    signal?: AbortSignal,
  ): Promise<string | null> {
    try {
      const result = await this.call(
        networkId,
        'eth_call',
        [{ to, data }, 'latest'],
        z.string(),
        signal,
      );
      return result === '0x' ? null : result;
    } catch (error) {
      if (!(error instanceof JsonRpcError)) throw error;
      this.log.debug(`eth_call ${data.slice(0, 10)} on ${to} reverted: ${error.message}`);
      return null;
    }
  }

  private decodeText(field: 'name' | 'symbol', address: string, output: string): string | null {
    try {
      // a single word is a bytes32 return
      if (output.length === 66) return bytes32ToString(legacyFunctions[field].decodeResult(output));
      return erc20[field].decodeResult(output);
    } catch (error) {
      this.log.debug(`undecodable ${field}() result from ${address}:`, error);
      return null;
    }
  }

  private decodeDecimals(address: string, output: string): number | null {
    try {
      return erc20.decimals.decodeResult(output);
    } catch (error) {
      this.log.debug(`undecodable decimals() result from ${address}:`, error);
      return null;
    }
  }
}
