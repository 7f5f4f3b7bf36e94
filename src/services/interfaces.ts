// Collaborators the built-in tools depend on. Tools only see these
// interfaces; concrete clients live beside this file.
import type { RawTransactionData, TokenMetadata } from '../types/transaction.ts';

export interface TransactionSource {
  /** @throws when the transaction cannot be found or the node fails */
  fetchTransaction(
    networkId: number,
    txHash: string,
    signal?: AbortSignal,
  ): Promise<RawTransactionData>;
}

export interface TokenMetadataSource {
  /** null when the contract exposes none of name/symbol/decimals */
  getTokenMetadata(
    networkId: number,
    address: string,
    signal?: AbortSignal,
  ): Promise<TokenMetadata | null>;
}

export interface PriceProvider {
  readonly source: string;
  /** USD price per whole token, keyed by lower-cased address; unpriced tokens are left out */
  getTokenPrices(
    networkId: number,
    addresses: readonly string[],
    signal?: AbortSignal,
  ): Promise<Record<string, number>>;
}

export interface NameResolver {
  /** Reverse lookup; null when the address has no name */
  lookupAddress(address: string, signal?: AbortSignal): Promise<string | null>;
}

export interface LlmRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface LlmResponse {
  text: string;
  model: string;
  tokensUsed?: number;
}

export interface LlmClient {
  complete(request: LlmRequest): Promise<LlmResponse>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
