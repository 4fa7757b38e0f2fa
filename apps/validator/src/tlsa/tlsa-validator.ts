import { normalizeName, type Domain } from '../dns/name.js';
import type { TlsaRecord } from '../dns/records.js';
import { verifyRRset } from '../dnssec/signature-verifier.js';
import { NotFoundError, toError } from '../errors.js';
import { logger, type Logger } from '../logger.js';
import type { RecordFetcher } from '../record-fetcher.js';
import { worstStatus, type LinkStatus } from '../status.js';
import type { WalkResult } from '../zone-walker.js';
import {
  describeCertificate,
  type CertificateClient,
  type CertificateFacts,
  type PresentedChain,
} from './certificate.js';
import { analyzeDane, type DaneAnalysis } from './dane-analysis.js';
import { matchAssociation, matchingTypeName, selectorName, usageName, type AssociationResult } from './tlsa-matcher.js';

export type DaneStatus = 'valid' | 'invalid' | 'no-tlsa' | 'dnssec-required' | 'cert-unavailable' | 'indeterminate';

export interface TlsaSummary {
  status: LinkStatus;
  records_found: number;
  dane_status: DaneStatus;
  message: string;
}

export interface TlsaRecordView {
  usage: number;
  selector: number;
  matching_type: number;
  usage_name: string;
  selector_name: string;
  matching_type_name: string;
  association_data: string;
}

/** What the DANE check established, before any analysis */
export interface TlsaFindings {
  name: string;
  port: number;
  protocol: string;
  summary: TlsaSummary;
  dnssec_status: LinkStatus;
  records: TlsaRecordView[];
  associations: AssociationResult[];
  certificate?: CertificateFacts;
}

export interface TlsaReport extends TlsaFindings {
  analysis: DaneAnalysis;
}

export interface TlsaValidatorOptions {
  tlsTimeoutMs: number;
  port?: number;
  protocol?: string;
}

/** `_443._tcp.example.com.` */
export function tlsaOwnerName(domain: string, port = 443, protocol = 'tcp'): string {
  return normalizeName(`_${port}._${protocol}.${normalizeName(domain)}`);
}

/** Where a DANE outcome sits in the chain-of-trust ordering */
export function daneToChainStatus(daneStatus: DaneStatus, tlsaDnssecStatus: LinkStatus): LinkStatus {
  switch (daneStatus) {
    case 'valid':
      return 'valid';
    case 'invalid':
      return 'bogus';
    case 'no-tlsa':
      return 'insecure';
    case 'dnssec-required':
      return tlsaDnssecStatus;
    case 'cert-unavailable':
    case 'indeterminate':
      return 'indeterminate';
  }
}

function recordView(record: TlsaRecord): TlsaRecordView {
  return {
    usage: record.usage,
    selector: record.selector,
    matching_type: record.matchingType,
    usage_name: usageName(record.usage),
    selector_name: selectorName(record.selector),
    matching_type_name: matchingTypeName(record.matchingType),
    association_data: record.certificateAssociationData.toString('hex'),
  };
}

/**
 * DANE check for one service: fetch the TLSA RRset, prove it with the keys
 * the chain walk established, then match it against the live certificate.
 */
export class TlsaValidator {
  private readonly log: Logger;

  constructor(
    private readonly fetcher: RecordFetcher,
    private readonly certificates: CertificateClient,
    private readonly options: TlsaValidatorOptions,
    log: Logger = logger,
  ) {
    this.log = log;
  }

  async validate(domain: Domain, walk: WalkResult, now: Date): Promise<TlsaReport> {
    const port = this.options.port ?? 443;
    const protocol = this.options.protocol ?? 'tcp';
    const name = tlsaOwnerName(domain.name, port, protocol);
    const chainStatus = worstStatus(walk.chain.map((link) => link.status));

    const report = (
      daneStatus: DaneStatus,
      message: string,
      dnssecStatus: LinkStatus,
      extra: Partial<Pick<TlsaFindings, 'records' | 'associations' | 'certificate'>> = {},
    ): TlsaReport => {
      const findings: TlsaFindings = {
        name,
        port,
        protocol,
        summary: {
          status: daneToChainStatus(daneStatus, dnssecStatus),
          records_found: extra.records?.length ?? 0,
          dane_status: daneStatus,
          message,
        },
        dnssec_status: dnssecStatus,
        records: extra.records ?? [],
        associations: extra.associations ?? [],
        certificate: extra.certificate,
      };
      return { ...findings, analysis: analyzeDane(findings) };
    };

    const tlsa = await this.fetcher.fetchTlsa(name);
    if (!tlsa.ok) {
      if (tlsa.error instanceof NotFoundError) {
        return report('no-tlsa', `No TLSA records found at ${name}`, chainStatus);
      }
      return report('indeterminate', `TLSA lookup failed: ${tlsa.error.message}`, 'indeterminate');
    }
    const records = tlsa.records.map(recordView);

    // The TLSA RRset is only as trustworthy as the chain above it
    let dnssecStatus: LinkStatus = chainStatus;
    let dnssecReason = `Chain of trust is ${chainStatus}`;
    if (chainStatus === 'valid') {
      const signer = tlsa.signatures[0]?.signerName;
      const keys = signer ? walk.trustedKeys.get(normalizeName(signer)) : undefined;
      if (!signer || !keys) {
        dnssecStatus = 'bogus';
        dnssecReason = signer ? `TLSA signer ${signer} is not a validated zone` : 'TLSA records are not signed';
      } else {
        const check = verifyRRset(tlsa.rrset, tlsa.signatures, keys, now);
        dnssecStatus = check.status === 'valid' ? 'valid' : check.status === 'invalid' ? 'bogus' : 'indeterminate';
        dnssecReason = check.status === 'valid' ? '' : check.reason;
      }
    }
    if (dnssecStatus !== 'valid') {
      return report('dnssec-required', `TLSA records need a validated DNSSEC chain: ${dnssecReason}`, dnssecStatus, {
        records,
      });
    }

    const host = domain.name === '.' ? '.' : domain.name.slice(0, -1);
    let chain: PresentedChain;
    try {
      chain = await this.certificates.fetchChain(host, port, { timeoutMs: this.options.tlsTimeoutMs });
    } catch (error) {
      const message = toError(error).message;
      this.log.debug('Certificate retrieval failed', { host, port, error: toError(error) });
      return report('cert-unavailable', `Unable to retrieve certificate from ${host}:${port}: ${message}`, dnssecStatus, {
        records,
      });
    }

    let certificate: CertificateFacts | undefined;
    try {
      certificate = describeCertificate(chain.certificates[0], now, chain.certificates.length);
    } catch (error) {
      this.log.debug('Unable to describe certificate', { host, error: toError(error) });
    }

    const associations = tlsa.records.map((record) => matchAssociation(record, chain));
    const matched = associations.filter((association) => association.matched).length;
    if (matched > 0) {
      return report('valid', `${matched} of ${records.length} TLSA records match the server certificate`, dnssecStatus, {
        records,
        associations,
        certificate,
      });
    }
    return report('invalid', `None of ${records.length} TLSA records match the server certificate`, dnssecStatus, {
      records,
      associations,
      certificate,
    });
  }
}
