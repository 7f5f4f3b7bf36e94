// Transaction data shapes shared by the tools, collaborators and baggage keys
import { z } from 'zod';

// ------------------------------------------------------------
// RAW OBJECTS (from the RPC collaborator before enrichment)
// ------------------------------------------------------------

export const HexString = z.string().regex(/^0x[0-9a-fA-F]*$/, 'Expected a 0x-prefixed hex string');

export const RawLog = z.object({
  address: z.string(),
  topics: z.array(HexString),
  data: HexString,
  logIndex: HexString.optional(),
});
export type RawLog = z.infer<typeof RawLog>;

export const RawReceipt = z.object({
  from: z.string(),
  to: z.string().nullable(),
  gasUsed: HexString,
  status: HexString,
  effectiveGasPrice: HexString.optional(),
  blockNumber: HexString.optional(),
});
export type RawReceipt = z.infer<typeof RawReceipt>;

export const RawBlock = z.object({
  number: HexString,
  timestamp: HexString,
});
export type RawBlock = z.infer<typeof RawBlock>;

export const RawTransactionData = z.object({
  txHash: HexString,
  networkId: z.number().int().positive(),
  receipt: RawReceipt,
  logs: z.array(RawLog),
  block: RawBlock.optional(),
});
export type RawTransactionData = z.infer<typeof RawTransactionData>;

// ------------------------------------------------------------
// ENRICHED OBJECTS (written by tools)
// ------------------------------------------------------------

export const TransactionContext = z.object({
  sender: z.string().optional(),
  recipient: z.string().optional(),
  gasUsed: z.string().optional(),
  status: z.string().optional(),
  blockNumber: z.number().int().optional(),
  timestampMs: z.number().int().optional(),
});
export type TransactionContext = z.infer<typeof TransactionContext>;

export const TokenTransfer = z.object({
  type: z.enum(['ERC20', 'ERC721']),
  contract: z.string(),
  from: z.string(),
  to: z.string(),
  amount: z.string().optional(), // raw integer amount, decimal string
  tokenId: z.string().optional(),
  logIndex: z.number().int(),
});
export type TokenTransfer = z.infer<typeof TokenTransfer>;

export const TokenMetadata = z.object({
  address: z.string(),
  name: z.string(),
  symbol: z.string(),
  decimals: z.number().int().min(0),
  type: z.enum(['ERC20', 'ERC721', 'unknown']),
});
export type TokenMetadata = z.infer<typeof TokenMetadata>;

export const TokenPrice = z.object({
  contract: z.string(),
  price: z.number().nonnegative(),
  currency: z.literal('usd'),
  source: z.string(),
  lastUpdatedMs: z.number().int(),
});
export type TokenPrice = z.infer<typeof TokenPrice>;

export const TransferValue = z.object({
  logIndex: z.number().int(),
  contract: z.string(),
  symbol: z.string(),
  displayAmount: z.string(),
  usdValue: z.number().nullable(),
});
export type TransferValue = z.infer<typeof TransferValue>;

export const Explanation = z.object({
  summary: z.string(),
  model: z.string(),
  tokensUsed: z.number().int().optional(),
});
export type Explanation = z.infer<typeof Explanation>;
