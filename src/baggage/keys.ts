// Well-known baggage slots. Each slot has exactly one writing tool (noted
// beside it); readers must tolerate the slot being absent.
import { z } from 'zod';
import { baggageKey } from './baggage.ts';
import {
  Explanation,
  RawTransactionData,
  TokenMetadata,
  TokenPrice,
  TokenTransfer,
  TransactionContext,
  TransferValue,
} from '../types/transaction.ts';

// seeded by the caller before the run
export const RAW_DATA = baggageKey('raw_data', RawTransactionData);

// transaction_context_provider
export const TRANSACTION_CONTEXT = baggageKey('transaction_context', TransactionContext);

// token_transfer_extractor
export const TRANSFERS = baggageKey('transfers', z.array(TokenTransfer));

// token_metadata_enricher, keyed by lower-cased contract address
export const TOKEN_METADATA = baggageKey('token_metadata', z.record(z.string(), TokenMetadata));

// erc20_price_lookup, keyed by lower-cased contract address
export const TOKEN_PRICES = baggageKey('token_prices', z.record(z.string(), TokenPrice));

// monetary_value_enricher
export const TRANSFER_VALUES = baggageKey('transfer_values', z.array(TransferValue));

// name_resolver, keyed by lower-cased address
export const NAMES = baggageKey('ens_names', z.record(z.string(), z.string()));

// transaction_explainer
export const EXPLANATION = baggageKey('explanation', Explanation);
