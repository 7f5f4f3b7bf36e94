import { ENS_REGISTRY, registryFunctions, resolverFunctions, reverseNode } from '../abi/ens.ts';
import { log as rootLog, type Logger } from '../utils/logger.ts';
import type { NameResolver } from './interfaces.ts';
import type { JsonRpcClient } from './rpc.ts';

const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

export const ENS_NETWORK_ID = 1;

/**
 * Reverse resolution through the mainnet ENS registry: registry.resolver(node)
 * then resolver.name(node) for the `<address>.addr.reverse` node. The claimed
 * name is not forward-verified.
 */
export class EnsNameResolver implements NameResolver {
  private readonly log: Logger;

  constructor(
    private rpc: Pick<JsonRpcClient, 'ethCall'>,
    log?: Logger,
  ) {
    this.log = log ?? rootLog.child('ens');
  }

  async lookupAddress(address: string, signal?: AbortSignal): Promise<string | null> {
    const node = reverseNode(address);

    const resolverOut = await this.rpc.ethCall(
      ENS_NETWORK_ID,
      ENS_REGISTRY,
      registryFunctions.resolver.encode({ node }),
      signal,
    );
    if (resolverOut === null) return null;

    const resolver = registryFunctions.resolver.decodeResult(resolverOut).toLowerCase();
    if (resolver === ZERO_ADDRESS) {
      this.log.debug(`no reverse record for ${address}`);
      return null;
    }

    const nameOut = await this.rpc.ethCall(
      ENS_NETWORK_ID,
      resolver,
      resolverFunctions.name.encode({ node }),
      signal,
    );
    if (nameOut === null) return null;

    const name = resolverFunctions.name.decodeResult(nameOut);
    return name.length > 0 ? name : null;
  }
}
