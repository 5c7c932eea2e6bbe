import { describe, it, expect } from '@jest/globals';
import { RequestValidator } from '../services/validator';
import { HASHLOCK, MAKER, RESOLVER } from './helpers';

describe('RequestValidator', () => {
  const validator = new RequestValidator();

  const orderBody = {
    maker: MAKER.toLowerCase(),
    resolver: RESOLVER,
    value: '100',
    expiry: 5000,
    hashlock: HASHLOCK,
    nonce: '1'
  };

  it('turns an escrow body into a typed request', () => {
    const result = validator.validateEscrowRequest({
      order: orderBody,
      tokenAsset: ' USDC ',
      safetyDeposit: '3',
      timelockDuration: '2000'
    });

    expect(result).toEqual({
      valid: true,
      errors: [],
      value: {
        order: { maker: MAKER, resolver: RESOLVER, value: 100n, expiry: 5000, hashlock: HASHLOCK, nonce: 1n },
        tokenAsset: 'USDC',
        tokenAmount: undefined,
        safetyDeposit: 3n,
        timelockDuration: 2000
      }
    });
  });

  it('collects every problem in one pass', () => {
    const result = validator.validateEscrowRequest({
      order: { ...orderBody, maker: '0x1234', value: '-5' },
      safetyDeposit: 3.5
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        'order.maker must be a 20-byte hex address',
        'order.value must be a non-negative integer amount',
        'tokenAsset is required',
        'safetyDeposit must be a non-negative integer amount'
      ]
    });
  });

  it('reports a missing nested object once', () => {
    const result = validator.validateDerive({ role: 'source' });

    expect(result).toEqual({ valid: false, errors: ['order must be an object'] });
  });

  it('keeps a claim secret exactly as sent', () => {
    expect(validator.validateClaim({ secret: '  padded  ' })).toEqual({
      valid: true,
      value: { secret: '  padded  ' },
      errors: []
    });
    expect(validator.validateClaim({ secret: '' })).toEqual({ valid: false, errors: ['secret is required'] });
  });

  it('rejects bodies that are not objects', () => {
    expect(validator.validateClaim('secret')).toEqual({
      valid: false,
      errors: ['Request body must be a JSON object', 'secret is required']
    });
  });

  it('defaults order route data and derive role', () => {
    const order = validator.validateOrderRequest({
      resolver: RESOLVER,
      targetAsset: 'USDC',
      minOutput: 50,
      expiry: '9000',
      deposit: '2'
    });
    const derive = validator.validateDerive({ order: orderBody });

    expect(order.valid && order.value.routeData).toBe('0x');
    expect(derive.valid && derive.value.role).toBe('source');
  });

  it('rejects unknown roles and odd-length route data', () => {
    expect(validator.validateDerive({ order: orderBody, role: 'sideways' }).errors).toEqual([
      'role must be one of source, destination, fusion'
    ]);
    expect(
      validator.validateOrderRequest({
        resolver: RESOLVER,
        targetAsset: 'USDC',
        minOutput: '1',
        routeData: '0xabc',
        expiry: 9000,
        deposit: '2'
      }).errors
    ).toEqual(['routeData must be 0x-prefixed hex bytes']);
  });
});
