import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { deriveEscrowAddress } from '@hashlock-swap/escrow-core';
import { createCli } from '../cli';
import { HASHLOCK, MAKER, RESOLVER, SECRET } from './helpers';

describe('hashlock-swap CLI', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints the hashlock of a secret', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await createCli().parseAsync(['hashlock', SECRET], { from: 'user' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain(HASHLOCK);
  });

  it('generates a secret together with its hashlock', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await createCli().parseAsync(['hashlock', '--generate'], { from: 'user' });

    expect(log).toHaveBeenCalledTimes(2);
    expect(String(log.mock.calls[0][0])).toMatch(/0x[0-9a-f]{64}/);
  });

  it('derives an escrow address', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await createCli().parseAsync(
      [
        'derive',
        '--maker', MAKER,
        '--resolver', RESOLVER,
        '--value', '100',
        '--expiry', '5000',
        '--hashlock', HASHLOCK,
        '--nonce', '1',
        '--role', 'destination'
      ],
      { from: 'user' }
    );

    const expected = deriveEscrowAddress(
      { maker: MAKER, resolver: RESOLVER, value: 100n, expiry: 5000, hashlock: HASHLOCK, nonce: 1n },
      'destination'
    );
    expect(String(log.mock.calls[0][0])).toContain(expected);
  });

  it('reports invalid derive input and sets a failing exit code', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await createCli().parseAsync(
      ['derive', '--maker', '0x12', '--resolver', RESOLVER, '--value', '1', '--expiry', '1', '--hashlock', HASHLOCK],
      { from: 'user' }
    );

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain('order.maker must be a 20-byte hex address');
    expect(process.exitCode).toBe(1);
  });
});
