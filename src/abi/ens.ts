// ENS registry and public resolver calls used for reverse resolution.
import * as p from '@subsquid/evm-codec';
import { viewFun } from '@subsquid/evm-abi';
import { keccak_256 } from '@noble/hashes/sha3';
import { bytesToHex, concatBytes, utf8ToBytes } from '@noble/hashes/utils';

export const ENS_REGISTRY = '0x00000000000c2e074ec69a0dfb2997ba6c7d2e1e';

export const registryFunctions = {
  resolver: viewFun('0x0178b8bf', 'resolver(bytes32)', { node: p.bytes32 }, p.address),
};

export const resolverFunctions = {
  name: viewFun('0x691f3431', 'name(bytes32)', { node: p.bytes32 }, p.string),
};

/** EIP-137 namehash */
export function namehash(name: string): string {
  let node: Uint8Array = new Uint8Array(32);
  if (name) {
    for (const label of name.split('.').reverse()) {
      node = keccak_256(concatBytes(node, keccak_256(utf8ToBytes(label))));
    }
  }
  return `0x${bytesToHex(node)}`;
}

/** Node of `<address>.addr.reverse` */
export function reverseNode(address: string): string {
  return namehash(`${address.slice(2).toLowerCase()}.addr.reverse`);
}
