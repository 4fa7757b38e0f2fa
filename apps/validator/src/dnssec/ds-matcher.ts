import crypto from 'crypto';
import { encodeName } from '../dns/name.js';
import { encodeDnsKeyRdata, type DnsKey, type DsRecord } from '../dns/records.js';

const digestAlgorithms: Record<number, { hash: string; name: string }> = {
  1: { hash: 'sha1', name: 'SHA-1' },
  2: { hash: 'sha256', name: 'SHA-256' },
  4: { hash: 'sha384', name: 'SHA-384' },
};

export function isSupportedDigestType(digestType: number): boolean {
  return digestType in digestAlgorithms;
}

export function digestTypeName(digestType: number): string {
  return digestAlgorithms[digestType]?.name ?? `DIGEST${digestType}`;
}

/** hash(owner name in canonical wire form || DNSKEY RDATA); null for unknown digest types */
export function computeDsDigest(key: DnsKey, digestType: number): Buffer | null {
  const algorithm = digestAlgorithms[digestType];
  if (!algorithm) {
    return null;
  }
  return crypto
    .createHash(algorithm.hash)
    .update(Buffer.concat([encodeName(key.zone), encodeDnsKeyRdata(key)]))
    .digest();
}

/** Outcome of binding a zone's keys to something the parent or configuration vouches for */
export type KeyBinding = { matched: true; key: DnsKey } | { matched: false; reason: string; unsupported: boolean };

export type DsMatch = { matched: true; key: DnsKey; ds: DsRecord } | Extract<KeyBinding, { matched: false }>;

/**
 * Find a key that a DS record vouches for. Key tag, algorithm and the
 * recomputed digest must all agree; a tag collision alone is not a match.
 */
export function matchDs(keys: readonly DnsKey[], dsRecords: readonly DsRecord[]): DsMatch {
  if (dsRecords.length === 0) {
    return { matched: false, reason: 'No DS records', unsupported: false };
  }
  if (dsRecords.every((ds) => !isSupportedDigestType(ds.digestType))) {
    return {
      matched: false,
      reason: `DS digest types not supported: ${dsRecords.map((ds) => digestTypeName(ds.digestType)).join(', ')}`,
      unsupported: true,
    };
  }

  const mismatches: string[] = [];
  for (const ds of dsRecords) {
    if (!isSupportedDigestType(ds.digestType)) {
      continue;
    }
    for (const key of keys) {
      if (key.keyTag !== ds.keyTag || key.algorithm !== ds.algorithm) {
        continue;
      }
      const digest = computeDsDigest(key, ds.digestType);
      if (digest && digest.equals(ds.digest)) {
        return { matched: true, key, ds };
      }
      mismatches.push(`DS ${ds.keyTag} digest does not match DNSKEY ${key.keyTag}`);
    }
  }

  const zone = dsRecords[0].zone;
  const tags = dsRecords.map((ds) => ds.keyTag).join(', ');
  return {
    matched: false,
    reason: mismatches.length > 0 ? mismatches.join('; ') : `No DNSKEY at ${zone} matches DS key tag ${tags}`,
    unsupported: false,
  };
}
