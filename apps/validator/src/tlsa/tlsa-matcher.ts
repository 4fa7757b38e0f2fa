import crypto from 'crypto';
import type { TlsaRecord } from '../dns/records.js';
import { toError } from '../errors.js';
import { chainsTo, subjectPublicKeyInfo, type PresentedChain } from './certificate.js';

export const TlsaUsage = { PKIX_TA: 0, PKIX_EE: 1, DANE_TA: 2, DANE_EE: 3 } as const;
export const TlsaSelector = { FULL_CERTIFICATE: 0, SPKI: 1 } as const;
export const TlsaMatchingType = { FULL: 0, SHA256: 1, SHA512: 2 } as const;

const usageNames: Record<number, string> = { 0: 'PKIX-TA', 1: 'PKIX-EE', 2: 'DANE-TA', 3: 'DANE-EE' };
const selectorNames: Record<number, string> = { 0: 'Cert', 1: 'SPKI' };
const matchingTypeNames: Record<number, string> = { 0: 'Full', 1: 'SHA-256', 2: 'SHA-512' };

export function usageName(usage: number): string {
  return usageNames[usage] ?? `Unknown (${usage})`;
}

export function selectorName(selector: number): string {
  return selectorNames[selector] ?? `Unknown (${selector})`;
}

export function matchingTypeName(matchingType: number): string {
  return matchingTypeNames[matchingType] ?? `Unknown (${matchingType})`;
}

/** Certificate association data for `certificate` under a selector and matching type; null if either is unknown */
export function computeAssociation(certificate: Buffer, selector: number, matchingType: number): Buffer | null {
  let selected: Buffer;
  if (selector === TlsaSelector.FULL_CERTIFICATE) {
    selected = certificate;
  } else if (selector === TlsaSelector.SPKI) {
    selected = subjectPublicKeyInfo(certificate);
  } else {
    return null;
  }

  switch (matchingType) {
    case TlsaMatchingType.FULL:
      return selected;
    case TlsaMatchingType.SHA256:
      return crypto.createHash('sha256').update(selected).digest();
    case TlsaMatchingType.SHA512:
      return crypto.createHash('sha512').update(selected).digest();
    default:
      return null;
  }
}

export interface AssociationResult {
  usage: number;
  selector: number;
  matching_type: number;
  usage_name: string;
  selector_name: string;
  matching_type_name: string;
  association_data: string;
  matched: boolean;
  /** Index in the presented chain of the certificate that matched */
  matched_certificate?: number;
  reason: string;
}

/**
 * Check one TLSA record against the presented chain. End-entity usages
 * look at the leaf; trust-anchor usages look at the CA certificates the
 * leaf chains up to. PKIX usages also need the handshake's PKIX verdict.
 */
export function matchAssociation(record: TlsaRecord, chain: PresentedChain): AssociationResult {
  const base = {
    usage: record.usage,
    selector: record.selector,
    matching_type: record.matchingType,
    usage_name: usageName(record.usage),
    selector_name: selectorName(record.selector),
    matching_type_name: matchingTypeName(record.matchingType),
    association_data: record.certificateAssociationData.toString('hex'),
  };
  const fail = (reason: string): AssociationResult => ({ ...base, matched: false, reason });

  if (!(record.usage in usageNames)) {
    return fail(`Unsupported certificate usage ${record.usage}`);
  }
  if (!(record.selector in selectorNames)) {
    return fail(`Unsupported selector ${record.selector}`);
  }
  if (!(record.matchingType in matchingTypeNames)) {
    return fail(`Unsupported matching type ${record.matchingType}`);
  }

  const pkix = record.usage === TlsaUsage.PKIX_TA || record.usage === TlsaUsage.PKIX_EE;
  const endEntity = record.usage === TlsaUsage.PKIX_EE || record.usage === TlsaUsage.DANE_EE;
  const candidates = endEntity ? [0] : chain.certificates.map((_, index) => index).slice(1);

  if (candidates.length === 0) {
    return fail('Server presented no CA certificate to match a trust anchor record against');
  }

  for (const index of candidates) {
    let computed: Buffer | null;
    try {
      computed = computeAssociation(chain.certificates[index], record.selector, record.matchingType);
    } catch (error) {
      return fail(`Unable to read presented certificate ${index}: ${toError(error).message}`);
    }
    if (!computed || !computed.equals(record.certificateAssociationData)) {
      continue;
    }
    if (!endEntity && !chainsTo(chain.certificates, index)) {
      return fail(`Certificate ${index} matches but the leaf does not chain to it`);
    }
    if (pkix && !chain.pkixAuthorized) {
      return fail(`Association matches but PKIX validation failed: ${chain.authorizationError ?? 'unknown error'}`);
    }
    return {
      ...base,
      matched: true,
      matched_certificate: index,
      reason: endEntity ? 'Matches the server certificate' : `Matches CA certificate ${index} in the presented chain`,
    };
  }

  return fail(
    endEntity
      ? 'Association data does not match the server certificate'
      : 'Association data does not match any presented CA certificate',
  );
}
