import crypto from 'crypto';
import { ValidationError } from '../errors.js';

/**
 * Signing algorithms by IANA number. Each supported entry owns its own
 * verification; any other number maps to an unsupported entry so callers
 * can tell "cannot check" apart from "checked and wrong".
 */
export interface SupportedAlgorithm {
  readonly supported: true;
  readonly number: number;
  readonly mnemonic: string;
  /** Throws ValidationError when the public key cannot be decoded */
  verify(publicKey: Buffer, data: Buffer, signature: Buffer): boolean;
}

export interface UnsupportedAlgorithm {
  readonly supported: false;
  readonly number: number;
  readonly mnemonic: string;
}

export type DnssecAlgorithm = SupportedAlgorithm | UnsupportedAlgorithm;

// DER encoding for SubjectPublicKeyInfo

function encodeLength(length: number): Buffer {
  if (length < 0x80) {
    return Buffer.from([length]);
  }
  const bytes: number[] = [];
  for (let remaining = length; remaining > 0; remaining = Math.floor(remaining / 256)) {
    bytes.unshift(remaining & 0xff);
  }
  return Buffer.from([0x80 | bytes.length, ...bytes]);
}

function encodeTlv(tag: number, value: Buffer): Buffer {
  return Buffer.concat([Buffer.from([tag]), encodeLength(value.length), value]);
}

function encodeInteger(value: Buffer): Buffer {
  let start = 0;
  while (start < value.length - 1 && value[start] === 0) {
    start++;
  }
  const trimmed = value.subarray(start);
  // Leading zero keeps the integer positive
  return encodeTlv(0x02, trimmed[0] & 0x80 ? Buffer.concat([Buffer.from([0]), trimmed]) : trimmed);
}

function encodeBitString(value: Buffer): Buffer {
  return encodeTlv(0x03, Buffer.concat([Buffer.from([0]), value]));
}

function encodeSequence(...items: Buffer[]): Buffer {
  return encodeTlv(0x30, Buffer.concat(items));
}

const RSA_ENCRYPTION = Buffer.from('06092a864886f70d0101010500', 'hex'); // rsaEncryption OID + NULL
const EC_PUBLIC_KEY = Buffer.from('06072a8648ce3d0201', 'hex');
const P256_CURVE = Buffer.from('06082a8648ce3d030107', 'hex');
const P384_CURVE = Buffer.from('06052b81040022', 'hex');
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');
const ED448_SPKI_PREFIX = Buffer.from('3043300506032b6571033a00', 'hex');

/**
 * RSA public key as DNSKEY carries it (RFC 3110): exponent length in one
 * octet, or zero followed by a two-octet length, then exponent and modulus.
 */
export function parseRsaPublicKey(publicKey: Buffer): { exponent: Buffer; modulus: Buffer } {
  if (publicKey.length < 3) {
    throw new ValidationError('RSA public key too short');
  }
  let offset = 1;
  let exponentLength = publicKey[0];
  if (exponentLength === 0) {
    exponentLength = publicKey.readUInt16BE(1);
    offset = 3;
  }
  if (exponentLength === 0 || offset + exponentLength >= publicKey.length) {
    throw new ValidationError('RSA public key exponent length out of range');
  }
  return {
    exponent: publicKey.subarray(offset, offset + exponentLength),
    modulus: publicKey.subarray(offset + exponentLength),
  };
}

export function rsaPublicKeyToSpki(publicKey: Buffer): Buffer {
  const { exponent, modulus } = parseRsaPublicKey(publicKey);
  const rsaKey = encodeSequence(encodeInteger(modulus), encodeInteger(exponent));
  return encodeSequence(RSA_ENCRYPTION, encodeBitString(rsaKey));
}

/** DNSKEY carries the bare x || y point; SPKI wants the uncompressed 0x04 form */
export function ecdsaPublicKeyToSpki(publicKey: Buffer, curve: 'P-256' | 'P-384'): Buffer {
  const coordinateLength = curve === 'P-256' ? 32 : 48;
  if (publicKey.length !== coordinateLength * 2) {
    throw new ValidationError(`Invalid ${curve} public key length ${publicKey.length}`);
  }
  const point = Buffer.concat([Buffer.from([0x04]), publicKey]);
  return encodeSequence(
    encodeSequence(EC_PUBLIC_KEY, curve === 'P-256' ? P256_CURVE : P384_CURVE),
    encodeBitString(point),
  );
}

function edwardsPublicKeyToSpki(publicKey: Buffer, prefix: Buffer, length: number, name: string): Buffer {
  if (publicKey.length !== length) {
    throw new ValidationError(`Invalid ${name} public key length ${publicKey.length}`);
  }
  return Buffer.concat([prefix, publicKey]);
}

function importKey(spki: Buffer): crypto.KeyObject {
  try {
    return crypto.createPublicKey({ key: spki, format: 'der', type: 'spki' });
  } catch (error) {
    throw new ValidationError('Public key rejected by crypto provider', { cause: error });
  }
}

function rsa(number: number, mnemonic: string, hash: string): SupportedAlgorithm {
  return {
    supported: true,
    number,
    mnemonic,
    verify: (publicKey, data, signature) => crypto.verify(hash, data, importKey(rsaPublicKeyToSpki(publicKey)), signature),
  };
}

function ecdsa(number: number, mnemonic: string, curve: 'P-256' | 'P-384', hash: string): SupportedAlgorithm {
  return {
    supported: true,
    number,
    mnemonic,
    // DNSSEC signatures are r || s, not DER
    verify: (publicKey, data, signature) =>
      crypto.verify(
        hash,
        data,
        { key: importKey(ecdsaPublicKeyToSpki(publicKey, curve)), dsaEncoding: 'ieee-p1363' },
        signature,
      ),
  };
}

function eddsa(number: number, mnemonic: string, prefix: Buffer, length: number): SupportedAlgorithm {
  return {
    supported: true,
    number,
    mnemonic,
    verify: (publicKey, data, signature) =>
      crypto.verify(null, data, importKey(edwardsPublicKeyToSpki(publicKey, prefix, length, mnemonic)), signature),
  };
}

const supportedAlgorithms: ReadonlyMap<number, SupportedAlgorithm> = new Map(
  [
    rsa(5, 'RSASHA1', 'sha1'),
    rsa(7, 'RSASHA1-NSEC3-SHA1', 'sha1'),
    rsa(8, 'RSASHA256', 'sha256'),
    rsa(10, 'RSASHA512', 'sha512'),
    ecdsa(13, 'ECDSAP256SHA256', 'P-256', 'sha256'),
    ecdsa(14, 'ECDSAP384SHA384', 'P-384', 'sha384'),
    eddsa(15, 'ED25519', ED25519_SPKI_PREFIX, 32),
    eddsa(16, 'ED448', ED448_SPKI_PREFIX, 57),
  ].map((algorithm): [number, SupportedAlgorithm] => [algorithm.number, algorithm]),
);

const knownUnsupported: Record<number, string> = {
  1: 'RSAMD5',
  3: 'DSA',
  6: 'DSA-NSEC3-SHA1',
  12: 'ECC-GOST',
  23: 'ECC-GOST12',
};

export function algorithmFor(number: number): DnssecAlgorithm {
  const supported = supportedAlgorithms.get(number);
  if (supported) {
    return supported;
  }
  return { supported: false, number, mnemonic: knownUnsupported[number] ?? `ALG${number}` };
}

export function algorithmName(number: number): string {
  return algorithmFor(number).mnemonic;
}

export function supportedAlgorithmNumbers(): number[] {
  return [...supportedAlgorithms.keys()];
}
