// Cache key builders and retention per category.
// Addresses and hashes are lower-cased so equal inputs map to one key.

const SECOND = 1000;
const HOUR = 60 * 60 * SECOND;
const DAY = 24 * HOUR;

export const TTL = {
  tokenMetadata: 365 * DAY,
  tokenPrice: HOUR,
  ensName: 30 * DAY,
  txContext: 365 * DAY,
} as const;

export const cacheKeys = {
  tokenMetadata: (networkId: number, address: string) =>
    `token-meta:${networkId}:${address.toLowerCase()}`,
  tokenPrice: (networkId: number, address: string) =>
    `erc20-price:${networkId}:${address.toLowerCase()}`,
  ensName: (address: string) => `ens-name:${address.toLowerCase()}`,
  txContext: (networkId: number, txHash: string) =>
    `tx-context:${networkId}:${txHash.toLowerCase()}`,
};
