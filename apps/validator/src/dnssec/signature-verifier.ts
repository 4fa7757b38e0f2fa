import { DNSKEY_PROTOCOL, recordTypeName } from '../dns/constants.js';
import { countLabels, encodeName, isSubdomainOf, normalizeName, splitLabels } from '../dns/name.js';
import { encodeRrsigHeader, isRevoked, isZoneKey, type DnsKey, type RRset, type RrsigRecord } from '../dns/records.js';
import { toError } from '../errors.js';
import { logger } from '../logger.js';
import { algorithmFor } from './algorithms.js';

export type VerificationOutcome =
  | { status: 'valid'; key: DnsKey; signature: RrsigRecord }
  | { status: 'invalid'; reason: string }
  | { status: 'indeterminate'; reason: string };

/**
 * Compare two 32-bit timestamps with RFC 1982 serial arithmetic.
 * Returns -1, 0 or 1 like a sort comparator.
 */
export function serialCompare(a: number, b: number): number {
  const difference = ((a >>> 0) - (b >>> 0)) >>> 0;
  if (difference === 0) {
    return 0;
  }
  return difference < 0x80000000 ? 1 : -1;
}

export function toSerialTime(now: Date): number {
  return Math.floor(now.getTime() / 1000) >>> 0;
}

export function isWithinValidityPeriod(rrsig: Pick<RrsigRecord, 'inception' | 'expiration'>, now: Date): boolean {
  const current = toSerialTime(now);
  return serialCompare(rrsig.inception, current) <= 0 && serialCompare(current, rrsig.expiration) <= 0;
}

/** Owner as signed: reconstructed as a wildcard when the RRSIG covers fewer labels */
function signedOwner(owner: string, labels: number): string {
  const ownerLabels = splitLabels(owner);
  if (labels >= countLabels(owner)) {
    return normalizeName(owner);
  }
  return `*.${ownerLabels.slice(ownerLabels.length - labels).join('.')}${labels === 0 ? '' : '.'}`;
}

/**
 * The exact octets an RRSIG signs: its own RDATA minus the signature, then
 * every RR in canonical form and order, duplicates removed.
 */
export function buildSignedData(rrset: RRset, rrsig: RrsigRecord): Buffer {
  const owner = encodeName(signedOwner(rrset.name, rrsig.labels));
  const sorted = [...rrset.rdata].sort(Buffer.compare);
  const unique = sorted.filter((rdata, index) => index === 0 || !rdata.equals(sorted[index - 1]));

  const parts: Buffer[] = [encodeRrsigHeader(rrsig)];
  for (const rdata of unique) {
    const fixed = Buffer.alloc(10);
    fixed.writeUInt16BE(rrset.type, 0);
    fixed.writeUInt16BE(rrset.class, 2);
    fixed.writeUInt32BE(rrsig.originalTtl >>> 0, 4);
    fixed.writeUInt16BE(rdata.length, 8);
    parts.push(owner, fixed, rdata);
  }
  return Buffer.concat(parts);
}

function candidateKeysFor(rrsig: RrsigRecord, keys: readonly DnsKey[]): DnsKey[] {
  const signer = normalizeName(rrsig.signerName);
  return keys.filter(
    (key) =>
      key.keyTag === rrsig.keyTag &&
      key.algorithm === rrsig.algorithm &&
      key.zone === signer &&
      key.protocol === DNSKEY_PROTOCOL &&
      isZoneKey(key) &&
      !isRevoked(key),
  );
}

/**
 * Check an RRset against its signatures using the given candidate keys.
 * Valid as soon as one signature verifies. Indeterminate only when every
 * signature that could have applied uses an algorithm we cannot check.
 */
export function verifyRRset(
  rrset: RRset,
  signatures: readonly RrsigRecord[],
  candidateKeys: readonly DnsKey[],
  now: Date,
): VerificationOutcome {
  const typeName = recordTypeName(rrset.type);
  if (rrset.rdata.length === 0) {
    return { status: 'invalid', reason: `Empty ${typeName} RRset at ${rrset.name}` };
  }
  if (signatures.length === 0) {
    return { status: 'invalid', reason: `No RRSIG covers ${typeName} at ${rrset.name}` };
  }

  const failures: string[] = [];
  let unsupported = 0;

  for (const rrsig of signatures) {
    const label = `RRSIG ${rrsig.keyTag}/${rrsig.algorithm}`;

    if (rrsig.typeCovered !== rrset.type) {
      failures.push(`${label} covers ${recordTypeName(rrsig.typeCovered)}, not ${typeName}`);
      continue;
    }
    if (!isSubdomainOf(rrset.name, rrsig.signerName)) {
      failures.push(`${label} signer ${rrsig.signerName} is not an ancestor of ${rrset.name}`);
      continue;
    }
    if (rrsig.labels > countLabels(rrset.name)) {
      failures.push(`${label} label count ${rrsig.labels} exceeds owner ${rrset.name}`);
      continue;
    }
    if (!isWithinValidityPeriod(rrsig, now)) {
      failures.push(`${label} is outside its validity period`);
      continue;
    }

    const algorithm = algorithmFor(rrsig.algorithm);
    if (!algorithm.supported) {
      unsupported++;
      failures.push(`${label} uses unsupported algorithm ${algorithm.mnemonic}`);
      continue;
    }

    const keys = candidateKeysFor(rrsig, candidateKeys);
    if (keys.length === 0) {
      failures.push(`${label} has no matching DNSKEY`);
      continue;
    }

    const signedData = buildSignedData(rrset, rrsig);
    for (const key of keys) {
      try {
        if (algorithm.verify(key.publicKey, signedData, rrsig.signature)) {
          return { status: 'valid', key, signature: rrsig };
        }
      } catch (error) {
        logger.debug('Signature check raised', { rrset: rrset.name, keyTag: key.keyTag, error: toError(error) });
      }
    }
    failures.push(`${label} signature does not verify`);
  }

  const reason = `${typeName} at ${rrset.name}: ${failures.join('; ')}`;
  if (unsupported > 0 && unsupported === failures.length) {
    return { status: 'indeterminate', reason };
  }
  return { status: 'invalid', reason };
}
