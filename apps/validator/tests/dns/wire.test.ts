import { describe, expect, it } from 'vitest';
import { RecordType } from '../../src/dns/constants.js';
import { buildQuery, decodeMessage, encodeMessage, readName } from '../../src/dns/wire.js';
import { ProtocolError } from '../../src/errors.js';

describe('DNS wire format', () => {
  it('should build a DNSSEC-OK query with checking disabled', () => {
    const query = buildQuery('Bondit.dk', RecordType.DNSKEY, { id: 0x1234 });
    expect(query.questions).toEqual([{ name: 'bondit.dk.', type: 48, class: 1 }]);
    expect(query.flags.rd).toBe(true);
    expect(query.flags.cd).toBe(true);
    expect(query.additional).toHaveLength(1);
    expect(query.additional[0].type).toBe(RecordType.OPT);
    expect(query.additional[0].class).toBe(4096);
    expect(query.additional[0].ttl).toBe(0x8000);
  });

  it('should encode the header and question', () => {
    const wire = encodeMessage(buildQuery('a.b', RecordType.A, { id: 0xabcd }));
    // id, flags (RD + CD), 1 question, 0 answers, 0 authority, 1 additional
    expect(wire.subarray(0, 12).toString('hex')).toBe('abcd' + '0110' + '0001' + '0000' + '0000' + '0001');
    // a.b. A IN
    expect(wire.subarray(12, 23).toString('hex')).toBe('0161016200' + '0001' + '0001');
  });

  it('should decode what it encodes', () => {
    const query = buildQuery('example.com', RecordType.DS, { id: 7 });
    const decoded = decodeMessage(encodeMessage(query));
    expect(decoded.id).toBe(7);
    expect(decoded.questions).toEqual(query.questions);
    expect(decoded.additional[0]).toEqual(query.additional[0]);
    expect(decoded.rcode).toBe(0);
  });

  it('should follow compression pointers', () => {
    // "example.com." at offset 0, then "www" + pointer to 0
    const buffer = Buffer.concat([
      Buffer.from('076578616d706c6503636f6d00', 'hex'),
      Buffer.from('03777777c000', 'hex'),
    ]);
    expect(readName(buffer, 13)).toEqual({ name: 'www.example.com.', offset: 19 });
  });

  it('should reject forward and self pointers', () => {
    expect(() => readName(Buffer.from('c000', 'hex'), 0)).toThrow(ProtocolError);
    expect(() => readName(Buffer.from('c00200', 'hex'), 0)).toThrow('Invalid compression pointer');
  });

  it('should reject truncated messages', () => {
    expect(() => decodeMessage(Buffer.alloc(5))).toThrow('DNS message shorter than header');
    const wire = encodeMessage(buildQuery('example.com', RecordType.A, { id: 1 }));
    expect(() => decodeMessage(wire.subarray(0, wire.length - 3))).toThrow(ProtocolError);
  });

  it('should merge the extended rcode from the OPT record', () => {
    const message = buildQuery('example.com', RecordType.A, { id: 1 });
    message.flags.qr = true;
    message.rcode = 0;
    // BADVERS (16): upper 8 bits = 1 in the OPT TTL
    message.additional[0] = { ...message.additional[0], ttl: 0x01000000 };
    expect(decodeMessage(encodeMessage(message)).rcode).toBe(16);
  });
});
