import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../../cli-args.ts';
import { TX_HASH } from '../_utils/fixtures.ts';

describe('parseCliArgs', () => {
  it('takes the hash with optional network and config', () => {
    expect(parseCliArgs([TX_HASH])).toEqual({ txHash: TX_HASH });
    expect(parseCliArgs(['--network', '8453', TX_HASH, '--config', 'alt.json'])).toEqual({
      txHash: TX_HASH,
      networkId: 8453,
      configPath: 'alt.json',
    });
  });

  it('rejects malformed input', () => {
    expect(() => parseCliArgs([])).toThrow('usage: txgraph <txHash>');
    expect(() => parseCliArgs(['0x1234'])).toThrow('not a transaction hash: 0x1234');
    expect(() => parseCliArgs([TX_HASH, '--network'])).toThrow('--network needs a value');
    expect(() => parseCliArgs([TX_HASH, '--network', 'base'])).toThrow(
      '--network must be a chain id, got base',
    );
    expect(() => parseCliArgs([TX_HASH, '--verbose'])).toThrow('unknown option --verbose');
    expect(() => parseCliArgs([TX_HASH, TX_HASH])).toThrow(`unexpected argument ${TX_HASH}`);
  });
});
