// Token ABI fragments: the Transfer event in its ERC20 and ERC721 shapes and
// the metadata getters read over eth_call.
import * as p from '@subsquid/evm-codec';
import { event, indexed, viewFun } from '@subsquid/evm-abi';

export const TRANSFER_TOPIC = '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';

// Same signature and topic; ERC721 indexes the third argument.
export const events = {
  Transfer: event(TRANSFER_TOPIC, 'Transfer(address,address,uint256)', {
    from: indexed(p.address),
    to: indexed(p.address),
    value: p.uint256,
  }),
  NftTransfer: event(TRANSFER_TOPIC, 'Transfer(address,address,uint256)', {
    from: indexed(p.address),
    to: indexed(p.address),
    tokenId: indexed(p.uint256),
  }),
};

export const functions = {
  name: viewFun('0x06fdde03', 'name()', {}, p.string),
  symbol: viewFun('0x95d89b41', 'symbol()', {}, p.string),
  decimals: viewFun('0x313ce567', 'decimals()', {}, p.uint8),
};

// Pre-standard tokens (MKR, SAI) return bytes32 from name() and symbol().
export const legacyFunctions = {
  name: viewFun('0x06fdde03', 'name()', {}, p.bytes32),
  symbol: viewFun('0x95d89b41', 'symbol()', {}, p.bytes32),
};

export function bytes32ToString(word: string): string | null {
  const text = Buffer.from(word.slice(2), 'hex').toString('utf8').replace(/\0+$/, '');
  return text.length > 0 ? text : null;
}
