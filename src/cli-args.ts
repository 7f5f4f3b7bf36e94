// txgraph <txHash> [--network <id>] [--config <file>]

export interface CliArgs {
  txHash: string;
  networkId?: number;
  configPath?: string;
}

export const USAGE = 'usage: txgraph <txHash> [--network <id>] [--config <file>]';

export function parseCliArgs(argv: readonly string[]): CliArgs {
  let txHash: string | undefined;
  let networkId: number | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === '--network' || arg === '--config') {
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`${arg} needs a value\n${USAGE}`);
      }
      if (arg === '--network') {
        if (!/^\d+$/.test(value)) throw new Error(`--network must be a chain id, got ${value}`);
        networkId = Number(value);
      } else {
        configPath = value;
      }
      i++;
    } else if (arg.startsWith('--')) {
      throw new Error(`unknown option ${arg}\n${USAGE}`);
    } else if (txHash === undefined) {
      txHash = arg;
    } else {
      throw new Error(`unexpected argument ${arg}\n${USAGE}`);
    }
  }

  if (!txHash) throw new Error(USAGE);
  if (!/^0x[0-9a-fA-F]{64}$/.test(txHash)) {
    throw new Error(`not a transaction hash: ${txHash}`);
  }
  return { txHash, networkId, configPath };
}
