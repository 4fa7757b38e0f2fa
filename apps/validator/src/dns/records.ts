import { ProtocolError } from '../errors.js';
import {
  CLASS_IN,
  DNSKEY_FLAG_REVOKE,
  DNSKEY_FLAG_SEP,
  DNSKEY_FLAG_ZONE,
  RecordType,
  recordTypeName,
} from './constants.js';
import { encodeName, normalizeName } from './name.js';
import { readName, type ResourceRecord } from './wire.js';

export interface DnsKey {
  zone: string;
  flags: number;
  protocol: number;
  algorithm: number;
  publicKey: Buffer;
  keyTag: number;
  ttl: number;
}

export interface DsRecord {
  zone: string;
  keyTag: number;
  algorithm: number;
  digestType: number;
  digest: Buffer;
  ttl: number;
}

export interface RrsigRecord {
  zone: string;
  typeCovered: number;
  algorithm: number;
  labels: number;
  originalTtl: number;
  /** Seconds since the epoch, modulo 2^32 */
  expiration: number;
  inception: number;
  keyTag: number;
  signerName: string;
  signature: Buffer;
  ttl: number;
}

export interface TlsaRecord {
  zone: string;
  usage: number;
  selector: number;
  matchingType: number;
  certificateAssociationData: Buffer;
  ttl: number;
}

/** All records of one owner, type and class, as raw RDATA */
export interface RRset {
  name: string;
  type: number;
  class: number;
  ttl: number;
  rdata: Buffer[];
}

/**
 * Key tag per RFC 4034 appendix B. Algorithm 1 (RSA/MD5) uses the
 * 16 bits before the last octet of the public key instead.
 */
export function computeKeyTag(rdata: Buffer, algorithm: number): number {
  if (algorithm === 1) {
    return rdata.length >= 4 ? rdata.readUInt16BE(rdata.length - 3) : 0;
  }
  let accumulator = 0;
  for (let i = 0; i < rdata.length; i++) {
    accumulator += i & 1 ? rdata[i] : rdata[i] << 8;
  }
  accumulator += (accumulator >> 16) & 0xffff;
  return accumulator & 0xffff;
}

export function encodeDnsKeyRdata(key: Pick<DnsKey, 'flags' | 'protocol' | 'algorithm' | 'publicKey'>): Buffer {
  const fixed = Buffer.alloc(4);
  fixed.writeUInt16BE(key.flags, 0);
  fixed.writeUInt8(key.protocol, 2);
  fixed.writeUInt8(key.algorithm, 3);
  return Buffer.concat([fixed, key.publicKey]);
}

export function parseDnsKey(zone: string, data: Buffer, ttl = 0): DnsKey {
  if (data.length < 5) {
    throw new ProtocolError('malformed', `DNSKEY RDATA for ${zone} too short`);
  }
  const algorithm = data.readUInt8(3);
  return {
    zone: normalizeName(zone),
    flags: data.readUInt16BE(0),
    protocol: data.readUInt8(2),
    algorithm,
    publicKey: Buffer.from(data.subarray(4)),
    keyTag: computeKeyTag(data, algorithm),
    ttl,
  };
}

export function isZoneKey(key: DnsKey): boolean {
  return (key.flags & DNSKEY_FLAG_ZONE) !== 0;
}

export function isRevoked(key: DnsKey): boolean {
  return (key.flags & DNSKEY_FLAG_REVOKE) !== 0;
}

export function isSecureEntryPoint(key: DnsKey): boolean {
  return (key.flags & DNSKEY_FLAG_SEP) !== 0;
}

export function encodeDsRdata(ds: Pick<DsRecord, 'keyTag' | 'algorithm' | 'digestType' | 'digest'>): Buffer {
  const fixed = Buffer.alloc(4);
  fixed.writeUInt16BE(ds.keyTag, 0);
  fixed.writeUInt8(ds.algorithm, 2);
  fixed.writeUInt8(ds.digestType, 3);
  return Buffer.concat([fixed, ds.digest]);
}

export function parseDs(zone: string, data: Buffer, ttl = 0): DsRecord {
  if (data.length < 5) {
    throw new ProtocolError('malformed', `DS RDATA for ${zone} too short`);
  }
  return {
    zone: normalizeName(zone),
    keyTag: data.readUInt16BE(0),
    algorithm: data.readUInt8(2),
    digestType: data.readUInt8(3),
    digest: Buffer.from(data.subarray(4)),
    ttl,
  };
}

/** RRSIG RDATA up to and including the signer name; this is what gets signed first */
export function encodeRrsigHeader(rrsig: Omit<RrsigRecord, 'zone' | 'signature' | 'ttl'>): Buffer {
  const fixed = Buffer.alloc(18);
  fixed.writeUInt16BE(rrsig.typeCovered, 0);
  fixed.writeUInt8(rrsig.algorithm, 2);
  fixed.writeUInt8(rrsig.labels, 3);
  fixed.writeUInt32BE(rrsig.originalTtl >>> 0, 4);
  fixed.writeUInt32BE(rrsig.expiration >>> 0, 8);
  fixed.writeUInt32BE(rrsig.inception >>> 0, 12);
  fixed.writeUInt16BE(rrsig.keyTag, 16);
  return Buffer.concat([fixed, encodeName(rrsig.signerName)]);
}

export function encodeRrsigRdata(rrsig: Omit<RrsigRecord, 'zone' | 'ttl'>): Buffer {
  return Buffer.concat([encodeRrsigHeader(rrsig), rrsig.signature]);
}

export function parseRrsig(zone: string, data: Buffer, ttl = 0): RrsigRecord {
  if (data.length < 19) {
    throw new ProtocolError('malformed', `RRSIG RDATA for ${zone} too short`);
  }
  // Signer name is never compressed
  const signer = readName(data, 18);
  return {
    zone: normalizeName(zone),
    typeCovered: data.readUInt16BE(0),
    algorithm: data.readUInt8(2),
    labels: data.readUInt8(3),
    originalTtl: data.readUInt32BE(4),
    expiration: data.readUInt32BE(8),
    inception: data.readUInt32BE(12),
    keyTag: data.readUInt16BE(16),
    signerName: signer.name,
    signature: Buffer.from(data.subarray(signer.offset)),
    ttl,
  };
}

export function encodeTlsaRdata(
  tlsa: Pick<TlsaRecord, 'usage' | 'selector' | 'matchingType' | 'certificateAssociationData'>,
): Buffer {
  return Buffer.concat([Buffer.from([tlsa.usage, tlsa.selector, tlsa.matchingType]), tlsa.certificateAssociationData]);
}

export function parseTlsa(zone: string, data: Buffer, ttl = 0): TlsaRecord {
  if (data.length < 3) {
    throw new ProtocolError('malformed', `TLSA RDATA for ${zone} too short`);
  }
  return {
    zone: normalizeName(zone),
    usage: data.readUInt8(0),
    selector: data.readUInt8(1),
    matchingType: data.readUInt8(2),
    certificateAssociationData: Buffer.from(data.subarray(3)),
    ttl,
  };
}

/** Gather the records of one type at `name` into an RRset; null when there are none */
export function collectRRset(records: readonly ResourceRecord[], name: string, type: number): RRset | null {
  const owner = normalizeName(name);
  const matching = records.filter(
    (record) => record.type === type && record.class === CLASS_IN && normalizeName(record.name) === owner,
  );
  if (matching.length === 0) {
    return null;
  }
  return {
    name: owner,
    type,
    class: CLASS_IN,
    ttl: Math.min(...matching.map((record) => record.ttl)),
    rdata: matching.map((record) => record.data),
  };
}

/** RRSIGs at `name` covering `type` */
export function collectSignatures(records: readonly ResourceRecord[], name: string, type: number): RrsigRecord[] {
  const owner = normalizeName(name);
  return records
    .filter((record) => record.type === RecordType.RRSIG && record.class === CLASS_IN && normalizeName(record.name) === owner)
    .map((record) => parseRrsig(record.name, record.data, record.ttl))
    .filter((rrsig) => rrsig.typeCovered === type);
}

// Presentation form of the records reported back to callers

export interface DnsKeyView {
  zone: string;
  flags: number;
  protocol: number;
  algorithm: number;
  key_tag: number;
  public_key: string;
}

export interface DsView {
  zone: string;
  key_tag: number;
  algorithm: number;
  digest_type: number;
  digest: string;
}

export interface RrsigView {
  zone: string;
  type_covered: string;
  algorithm: number;
  labels: number;
  original_ttl: number;
  expiration: number;
  inception: number;
  key_tag: number;
  signer: string;
}

export function dnsKeyView(key: DnsKey): DnsKeyView {
  return {
    zone: key.zone,
    flags: key.flags,
    protocol: key.protocol,
    algorithm: key.algorithm,
    key_tag: key.keyTag,
    public_key: key.publicKey.toString('base64'),
  };
}

export function dsView(ds: DsRecord): DsView {
  return {
    zone: ds.zone,
    key_tag: ds.keyTag,
    algorithm: ds.algorithm,
    digest_type: ds.digestType,
    digest: ds.digest.toString('hex'),
  };
}

export function rrsigView(rrsig: RrsigRecord): RrsigView {
  return {
    zone: rrsig.zone,
    type_covered: recordTypeName(rrsig.typeCovered),
    algorithm: rrsig.algorithm,
    labels: rrsig.labels,
    original_ttl: rrsig.originalTtl,
    expiration: rrsig.expiration,
    inception: rrsig.inception,
    key_tag: rrsig.keyTag,
    signer: rrsig.signerName,
  };
}
