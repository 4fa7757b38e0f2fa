import { RecordType, recordTypeName } from './dns/constants.js';
import { parentOf, type Domain } from './dns/name.js';
import type { DnsKey, DsRecord, RrsigRecord } from './dns/records.js';
import { matchDs, type KeyBinding } from './dnssec/ds-matcher.js';
import { verifyRRset } from './dnssec/signature-verifier.js';
import { hasTrustAnchor, matchTrustAnchor, type TrustAnchorSet } from './dnssec/trust-anchors.js';
import { NotFoundError } from './errors.js';
import { logger, type Logger } from './logger.js';
import type { FetchResult, RecordFetcher } from './record-fetcher.js';
import type { LinkStatus } from './status.js';

export interface ChainLink {
  zone: string;
  status: LinkStatus;
  algorithm?: number;
  key_tag?: number;
  error?: string;
}

export interface CollectedRecords {
  dnskey: DnsKey[];
  ds: DsRecord[];
  rrsig: RrsigRecord[];
}

export interface WalkResult {
  chain: ChainLink[];
  records: CollectedRecords;
  errors: string[];
  /** DNSKEY sets proven by the walk, by zone */
  trustedKeys: ReadonlyMap<string, readonly DnsKey[]>;
}

type ZoneStep = { kind: 'skip' } | { kind: 'link'; link: ChainLink; keys?: DnsKey[] };

function link(zone: string, status: Exclude<LinkStatus, 'valid'>, error: string): ZoneStep {
  return { kind: 'link', link: { zone, status, error } };
}

/**
 * Walks from the root towards the target, one zone cut at a time, proving
 * each zone's DNSKEY set from the already proven parent. Stops at the first
 * link that is not valid and returns the chain built so far.
 */
export class ZoneWalker {
  private readonly log: Logger;

  constructor(
    private readonly fetcher: RecordFetcher,
    private readonly anchors: TrustAnchorSet,
    log: Logger = logger,
  ) {
    this.log = log;
  }

  async walk(domain: Domain, now: Date): Promise<WalkResult> {
    const chain: ChainLink[] = [];
    const records: CollectedRecords = { dnskey: [], ds: [], rrsig: [] };
    const errors: string[] = [];
    const trustedKeys = new Map<string, readonly DnsKey[]>();
    let parentKeys: readonly DnsKey[] = [];

    for (const zone of domain.zoneCuts) {
      const step = await this.walkZone(zone, parentKeys, now, records);
      if (step.kind === 'skip') {
        this.log.debug('Name is not a zone cut', { zone });
        continue;
      }

      chain.push(step.link);
      this.log.debug('Chain link', { zone, status: step.link.status, error: step.link.error });

      if (step.link.status !== 'valid' || !step.keys) {
        if (step.link.error && (step.link.status === 'bogus' || step.link.status === 'indeterminate')) {
          errors.push(step.link.error);
        }
        break;
      }
      trustedKeys.set(zone, step.keys);
      parentKeys = step.keys;
    }

    return { chain, records, errors, trustedKeys };
  }

  private async walkZone(
    zone: string,
    parentKeys: readonly DnsKey[],
    now: Date,
    records: CollectedRecords,
  ): Promise<ZoneStep> {
    const isRoot = parentOf(zone) === null;
    const anchored = hasTrustAnchor(this.anchors, zone, now);

    const keys = await this.fetcher.fetchDnsKeys(zone);
    if (!keys.ok && !(keys.error instanceof NotFoundError)) {
      return link(zone, 'indeterminate', keys.error.message);
    }

    let ds: FetchResult<DsRecord> | null = null;
    if (!isRoot) {
      ds = await this.fetcher.fetchDs(zone);
      if (!ds.ok && !(ds.error instanceof NotFoundError)) {
        return link(zone, 'indeterminate', ds.error.message);
      }
    }
    const dsRecords: DsRecord[] = ds && ds.ok ? ds.records : [];

    if (keys.ok) {
      records.dnskey.push(...keys.records);
      records.rrsig.push(...keys.signatures);
    }
    if (ds && ds.ok) {
      records.ds.push(...ds.records);
      records.rrsig.push(...ds.signatures);

      // The DS RRset is the parent's data and must carry the parent's signature
      const dsCheck = verifyRRset(ds.rrset, ds.signatures, parentKeys, now);
      if (dsCheck.status === 'invalid') {
        return link(zone, 'bogus', `DS RRset for ${zone} does not verify: ${dsCheck.reason}`);
      }
      if (dsCheck.status === 'indeterminate') {
        return link(zone, 'indeterminate', dsCheck.reason);
      }
    }

    if (!keys.ok) {
      const missing = keys.error;
      if (missing instanceof NotFoundError && missing.kind === 'nxdomain') {
        return link(zone, 'indeterminate', `${zone} does not exist; denial of existence is not verified`);
      }
      if (dsRecords.length > 0) {
        return link(zone, 'bogus', `DS records exist for ${zone} but it publishes no DNSKEY`);
      }
      if (anchored) {
        return link(zone, 'bogus', `Trust anchor configured for ${zone} but it publishes no DNSKEY`);
      }
      // An SOA from an enclosing zone means this name lives inside its parent
      if (missing instanceof NotFoundError && missing.authority && missing.authority !== zone) {
        return { kind: 'skip' };
      }
      return link(zone, 'insecure', `Delegation to ${zone} is unsigned`);
    }

    let binding: KeyBinding;
    if (isRoot || anchored) {
      binding = matchTrustAnchor(this.anchors, zone, keys.records, now);
    } else if (dsRecords.length > 0) {
      binding = matchDs(keys.records, dsRecords);
    } else if (ds && !ds.ok && ds.error instanceof NotFoundError && ds.error.kind === 'nxdomain') {
      return link(zone, 'indeterminate', `DS lookup for ${zone} returned NXDOMAIN`);
    } else {
      return link(zone, 'insecure', `No DS record for ${zone}; delegation is unsigned`);
    }

    if (!binding.matched) {
      return link(zone, binding.unsupported ? 'indeterminate' : 'bogus', binding.reason);
    }

    // Any key the parent vouches for may have signed the set, e.g. during a KSK rollover
    const boundKeys = keys.records.filter((key) =>
      isRoot || anchored
        ? matchTrustAnchor(this.anchors, zone, [key], now).matched
        : matchDs([key], dsRecords).matched,
    );

    const keyCheck = verifyRRset(keys.rrset, keys.signatures, boundKeys, now);
    if (keyCheck.status === 'valid') {
      return {
        kind: 'link',
        link: { zone, status: 'valid', algorithm: keyCheck.key.algorithm, key_tag: keyCheck.key.keyTag },
        keys: keys.records,
      };
    }
    const reason = `${recordTypeName(RecordType.DNSKEY)} RRset for ${zone} does not verify: ${keyCheck.reason}`;
    return link(zone, keyCheck.status === 'indeterminate' ? 'indeterminate' : 'bogus', reason);
  }
}
