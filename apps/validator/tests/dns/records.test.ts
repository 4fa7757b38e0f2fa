import { describe, expect, it } from 'vitest';
import { RecordType } from '../../src/dns/constants.js';
import {
  collectRRset,
  collectSignatures,
  computeKeyTag,
  dnsKeyView,
  encodeDnsKeyRdata,
  encodeDsRdata,
  encodeRrsigRdata,
  encodeTlsaRdata,
  parseDnsKey,
  parseDs,
  parseRrsig,
  parseTlsa,
  rrsigView,
} from '../../src/dns/records.js';
import { ProtocolError } from '../../src/errors.js';
import { RFC4034_KEY, ROOT_KSK_2017 } from '../vectors-helper.js';

describe('DNSSEC record types', () => {
  describe('computeKeyTag', () => {
    it('should match the RFC 4034 example key', () => {
      const rdata = encodeDnsKeyRdata(RFC4034_KEY);
      expect(computeKeyTag(rdata, 5)).toBe(60485);
    });

    it('should match the root KSK-2017', () => {
      const rdata = encodeDnsKeyRdata(ROOT_KSK_2017);
      expect(computeKeyTag(rdata, 8)).toBe(20326);
    });

    it('should use the octets before the last one for algorithm 1', () => {
      const rdata = Buffer.from([0x01, 0x00, 0x03, 0x01, 0xaa, 0x12, 0x34, 0xff]);
      expect(computeKeyTag(rdata, 1)).toBe(0x1234);
    });
  });

  it('should parse DNSKEY RDATA and compute its key tag', () => {
    const key = parseDnsKey('DSKEY.example.com', encodeDnsKeyRdata(RFC4034_KEY), 86400);
    expect(key.zone).toBe('dskey.example.com.');
    expect(key.flags).toBe(256);
    expect(key.protocol).toBe(3);
    expect(key.algorithm).toBe(5);
    expect(key.keyTag).toBe(60485);
    expect(key.ttl).toBe(86400);
    expect(key.publicKey.equals(RFC4034_KEY.publicKey)).toBe(true);
  });

  it('should reject short RDATA', () => {
    expect(() => parseDnsKey('example.com', Buffer.from([1, 0, 3, 13]))).toThrow(ProtocolError);
    expect(() => parseDs('example.com', Buffer.from([0, 1, 8, 2]))).toThrow('DS RDATA for example.com too short');
    expect(() => parseTlsa('example.com', Buffer.from([3, 1]))).toThrow(ProtocolError);
    expect(() => parseRrsig('example.com', Buffer.alloc(18))).toThrow(ProtocolError);
  });

  it('should parse what it encodes for DS and TLSA', () => {
    const digest = Buffer.from('2bb183af5f22588179a53b0a98631fad1a292118', 'hex');
    const ds = parseDs('dskey.example.com.', encodeDsRdata({ keyTag: 60485, algorithm: 5, digestType: 1, digest }));
    expect(ds).toEqual({ zone: 'dskey.example.com.', keyTag: 60485, algorithm: 5, digestType: 1, digest, ttl: 0 });

    const data = Buffer.alloc(32, 0xab);
    const tlsa = parseTlsa('_443._tcp.example.com.', encodeTlsaRdata({ usage: 3, selector: 1, matchingType: 1, certificateAssociationData: data }));
    expect(tlsa.usage).toBe(3);
    expect(tlsa.selector).toBe(1);
    expect(tlsa.matchingType).toBe(1);
    expect(tlsa.certificateAssociationData.equals(data)).toBe(true);
  });

  it('should parse RRSIG RDATA with its signer name', () => {
    const signature = Buffer.from('c0ffee', 'hex');
    const rdata = encodeRrsigRdata({
      typeCovered: RecordType.DNSKEY,
      algorithm: 13,
      labels: 2,
      originalTtl: 3600,
      expiration: 1_700_000_000,
      inception: 1_690_000_000,
      keyTag: 4242,
      signerName: 'Bondit.dk.',
      signature,
    });
    const rrsig = parseRrsig('bondit.dk.', rdata, 300);
    expect(rrsig.signerName).toBe('bondit.dk.');
    expect(rrsig.signature.equals(signature)).toBe(true);
    expect(rrsigView(rrsig)).toEqual({
      zone: 'bondit.dk.',
      type_covered: 'DNSKEY',
      algorithm: 13,
      labels: 2,
      original_ttl: 3600,
      expiration: 1_700_000_000,
      inception: 1_690_000_000,
      key_tag: 4242,
      signer: 'bondit.dk.',
    });
  });

  it('should present DNSKEYs with a base64 public key', () => {
    const key = parseDnsKey('.', encodeDnsKeyRdata(ROOT_KSK_2017));
    expect(dnsKeyView(key)).toEqual({
      zone: '.',
      flags: 257,
      protocol: 3,
      algorithm: 8,
      key_tag: 20326,
      public_key: ROOT_KSK_2017.publicKey.toString('base64'),
    });
  });

  it('should collect an RRset and its covering signatures by owner and type', () => {
    const dnskey = encodeDnsKeyRdata(RFC4034_KEY);
    const sig = (type: number) =>
      encodeRrsigRdata({
        typeCovered: type,
        algorithm: 5,
        labels: 3,
        originalTtl: 86400,
        expiration: 2,
        inception: 1,
        keyTag: 60485,
        signerName: 'dskey.example.com.',
        signature: Buffer.from([1]),
      });
    const records = [
      { name: 'dskey.example.com.', type: RecordType.DNSKEY, class: 1, ttl: 600, data: dnskey },
      { name: 'DSKEY.example.com.', type: RecordType.DNSKEY, class: 1, ttl: 300, data: dnskey },
      { name: 'other.example.com.', type: RecordType.DNSKEY, class: 1, ttl: 300, data: dnskey },
      { name: 'dskey.example.com.', type: RecordType.RRSIG, class: 1, ttl: 300, data: sig(RecordType.DNSKEY) },
      { name: 'dskey.example.com.', type: RecordType.RRSIG, class: 1, ttl: 300, data: sig(RecordType.A) },
    ];

    const rrset = collectRRset(records, 'dskey.example.com', RecordType.DNSKEY);
    expect(rrset?.rdata).toHaveLength(2);
    expect(rrset?.ttl).toBe(300);
    expect(collectRRset(records, 'dskey.example.com', RecordType.DS)).toBeNull();

    const signatures = collectSignatures(records, 'dskey.example.com.', RecordType.DNSKEY);
    expect(signatures).toHaveLength(1);
    expect(signatures[0].typeCovered).toBe(RecordType.DNSKEY);
  });
});
