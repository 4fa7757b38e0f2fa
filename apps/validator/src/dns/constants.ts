export const RecordType = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  AAAA: 28,
  OPT: 41,
  DS: 43,
  RRSIG: 46,
  NSEC: 47,
  DNSKEY: 48,
  NSEC3: 50,
  TLSA: 52,
} as const;

export type RecordTypeName = keyof typeof RecordType;

export const Rcode = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

export const CLASS_IN = 1;

export const DNSKEY_PROTOCOL = 3;
export const DNSKEY_FLAG_ZONE = 0x0100;
export const DNSKEY_FLAG_REVOKE = 0x0080;
export const DNSKEY_FLAG_SEP = 0x0001;

/** EDNS(0) DNSSEC OK bit, carried in the OPT record's TTL field */
export const EDNS_DO_BIT = 0x8000;
export const EDNS_UDP_PAYLOAD_SIZE = 4096;

export function recordTypeName(type: number): string {
  for (const [name, value] of Object.entries(RecordType)) {
    if (value === type) {
      return name;
    }
  }
  return `TYPE${type}`;
}

export function rcodeName(rcode: number): string {
  for (const [name, value] of Object.entries(Rcode)) {
    if (value === rcode) {
      return name;
    }
  }
  return `RCODE${rcode}`;
}
