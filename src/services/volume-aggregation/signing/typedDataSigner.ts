import { TypedData, ec, shortString, typedData } from 'starknet';

export interface AuthRequestMessage {
  method: string;
  path: string;
  body: string;
  timestamp: number;
  expiration: number;
}

export interface StarkSignature {
  r: string;
  s: string;
}

/**
 * Cairo short-string encoding, as Paradex reports chain ids in clear text
 * (e.g. PRIVATE_SN_PARACLEAR_MAINNET).
 */
export function encodeChainId(chainName: string): string {
  return shortString.encodeShortString(chainName);
}

export function buildAuthTypedData(chainId: string, message: AuthRequestMessage): TypedData {
  return {
    domain: { name: 'Paradex', chainId, version: '1' },
    primaryType: 'Request',
    types: {
      StarkNetDomain: [
        { name: 'name', type: 'felt' },
        { name: 'chainId', type: 'felt' },
        { name: 'version', type: 'felt' }
      ],
      Request: [
        { name: 'method', type: 'felt' },
        { name: 'path', type: 'felt' },
        { name: 'body', type: 'felt' },
        { name: 'timestamp', type: 'felt' },
        { name: 'expiration', type: 'felt' }
      ]
    },
    message: {
      method: message.method,
      path: message.path,
      body: message.body,
      timestamp: message.timestamp,
      expiration: message.expiration
    }
  };
}

/** Pedersen hash chain over "StarkNet Message", domain, account and message. */
export function messageHash(data: TypedData, account: string): string {
  return typedData.getMessageHash(data, account);
}

/** ECDSA on the Stark curve; the nonce is RFC 6979 deterministic. */
export function signTypedData(data: TypedData, account: string, privateKey: string): StarkSignature {
  const signature = ec.starkCurve.sign(messageHash(data, account), privateKey);
  return { r: signature.r.toString(), s: signature.s.toString() };
}

export function verifyTypedData(
  data: TypedData,
  account: string,
  signature: StarkSignature,
  publicKey: Uint8Array | string
): boolean {
  const sig = new ec.starkCurve.Signature(BigInt(signature.r), BigInt(signature.s));
  return ec.starkCurve.verify(sig, messageHash(data, account), publicKey);
}

/** Full curve point, as verification needs it. */
export function starkPublicKey(privateKey: string): Uint8Array {
  return ec.starkCurve.getPublicKey(privateKey, false);
}

/** x coordinate of the public key, the form accounts are registered with. */
export function starkKey(privateKey: string): string {
  return ec.starkCurve.getStarkKey(privateKey);
}

/** Header form: a JSON array of the decimal r and s. */
export function formatSignatureHeader(signature: StarkSignature): string {
  return JSON.stringify([signature.r, signature.s]);
}
