import { TRANSFER_TOPIC } from '../../abi/erc20.ts';
import type { RawTransactionData, TokenMetadata } from '../../types/transaction.ts';

export const SENDER = `0x${'11'.repeat(20)}`;
export const RECEIVER = `0x${'22'.repeat(20)}`;
export const TOKEN = `0x${'aa'.repeat(20)}`;
export const NFT = `0x${'bb'.repeat(20)}`;
export const ZERO = `0x${'00'.repeat(20)}`;
export const TX_HASH = `0x${'ab'.repeat(32)}`;

export function addressTopic(address: string): string {
  return `0x${'0'.repeat(24)}${address.slice(2)}`;
}

export function uintWord(value: bigint): string {
  return `0x${value.toString(16).padStart(64, '0')}`;
}

/** ABI-encoded `string` return value */
export function abiString(value: string): string {
  const bytes = Buffer.from(value, 'utf8');
  const padded = bytes.toString('hex').padEnd(Math.ceil(bytes.length / 32) * 64, '0');
  return `0x${(32n).toString(16).padStart(64, '0')}${BigInt(bytes.length)
    .toString(16)
    .padStart(64, '0')}${padded}`;
}

/**
 * One ERC20 transfer of 1_500_000 base units (SENDER → RECEIVER) and one
 * ERC721 mint of token #42 to SENDER.
 */
export function makeRawTransaction(): RawTransactionData {
  return {
    txHash: TX_HASH,
    networkId: 1,
    receipt: {
      from: SENDER,
      to: TOKEN,
      gasUsed: '0x5208',
      status: '0x1',
      blockNumber: '0x10',
    },
    logs: [
      {
        address: TOKEN,
        topics: [TRANSFER_TOPIC, addressTopic(SENDER), addressTopic(RECEIVER)],
        data: uintWord(1_500_000n),
        logIndex: '0x0',
      },
      {
        address: NFT,
        topics: [TRANSFER_TOPIC, addressTopic(ZERO), addressTopic(SENDER), uintWord(42n)],
        data: '0x',
        logIndex: '0x1',
      },
    ],
    block: { number: '0x10', timestamp: '0x64000000' },
  };
}

export const USDC_META: TokenMetadata = {
  address: TOKEN,
  name: 'Test Dollar',
  symbol: 'TUSD',
  decimals: 6,
  type: 'ERC20',
};

export const NFT_META: TokenMetadata = {
  address: NFT,
  name: 'Test Pets',
  symbol: 'PETS',
  decimals: 0,
  type: 'unknown',
};
