import { describe, it, expect } from '@jest/globals';
import {
  buildAuthTypedData,
  encodeChainId,
  formatSignatureHeader,
  messageHash,
  signTypedData,
  starkKey,
  starkPublicKey,
  verifyTypedData
} from '../signing/typedDataSigner';

const ACCOUNT = '0x4a1b2c3d4e5f';
const PRIVATE_KEY = '0x1a2b3c4d5e6f7a8b';

const request = {
  method: 'POST',
  path: '/v1/auth',
  body: '',
  timestamp: 1700000000,
  expiration: 1700086400
};

describe('typed data signing', () => {
  const chainId = encodeChainId('SN_MAIN');

  it('should encode chain names as Cairo short strings', () => {
    expect(chainId).toBe('0x534e5f4d41494e');
  });

  it('should build the Paradex auth request shape', () => {
    const data = buildAuthTypedData(chainId, request);

    expect(data.primaryType).toBe('Request');
    expect(data.domain).toEqual({ name: 'Paradex', chainId, version: '1' });
    expect(data.message).toEqual(request);
  });

  it('should produce signatures that verify against the public key', () => {
    const data = buildAuthTypedData(chainId, request);
    const signature = signTypedData(data, ACCOUNT, PRIVATE_KEY);

    expect(verifyTypedData(data, ACCOUNT, signature, starkPublicKey(PRIVATE_KEY))).toBe(true);
  });

  it('should sign deterministically', () => {
    const data = buildAuthTypedData(chainId, request);

    expect(signTypedData(data, ACCOUNT, PRIVATE_KEY)).toEqual(signTypedData(data, ACCOUNT, PRIVATE_KEY));
  });

  it('should not verify a signature over a different message', () => {
    const signature = signTypedData(buildAuthTypedData(chainId, request), ACCOUNT, PRIVATE_KEY);
    const tampered = buildAuthTypedData(chainId, { ...request, expiration: request.expiration + 1 });

    expect(verifyTypedData(tampered, ACCOUNT, signature, starkPublicKey(PRIVATE_KEY))).toBe(false);
  });

  it('should bind the hash to the account and chain', () => {
    const data = buildAuthTypedData(chainId, request);

    expect(messageHash(data, ACCOUNT)).not.toBe(messageHash(data, '0x4a1b2c3d4e60'));
    expect(messageHash(data, ACCOUNT)).not.toBe(
      messageHash(buildAuthTypedData(encodeChainId('SN_SEPOLIA'), request), ACCOUNT)
    );
  });

  it('should derive the stark key from the private key', () => {
    expect(starkKey(PRIVATE_KEY)).toMatch(/^0x[0-9a-f]+$/);
    expect(starkKey(PRIVATE_KEY)).toBe(starkKey(PRIVATE_KEY));
  });

  it('should format signatures as a JSON array of decimals', () => {
    expect(formatSignatureHeader({ r: '123', s: '456' })).toBe('["123","456"]');
  });
});
