import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DNSKEY_PROTOCOL } from '../dns/constants.js';
import { normalizeName } from '../dns/name.js';
import { computeKeyTag, encodeDnsKeyRdata, type DnsKey, type DsRecord } from '../dns/records.js';
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import { matchDs, type KeyBinding } from './ds-matcher.js';

export const DEFAULT_TRUST_ANCHORS_PATH = fileURLToPath(new URL('../../config/root-anchors.json', import.meta.url));

const validity = {
  validFrom: z.iso.datetime({ offset: true }).optional(),
  validUntil: z.iso.datetime({ offset: true }).optional(),
};

const anchorSchema = z.discriminatedUnion('type', [
  z.object({
    zone: z.string().min(1),
    type: z.literal('ds'),
    keyTag: z.number().int().min(0).max(0xffff),
    algorithm: z.number().int().min(0).max(255),
    digestType: z.number().int().min(0).max(255),
    digest: z.string().regex(/^[0-9a-fA-F]+$/, 'digest must be hex'),
    ...validity,
  }),
  z.object({
    zone: z.string().min(1),
    type: z.literal('dnskey'),
    flags: z.number().int().min(0).max(0xffff),
    protocol: z.number().int().default(DNSKEY_PROTOCOL),
    algorithm: z.number().int().min(0).max(255),
    publicKey: z.base64(),
    ...validity,
  }),
]);

const anchorFileSchema = z.object({
  version: z.string().min(1),
  anchors: z.array(anchorSchema).min(1),
});

export type TrustAnchorFile = z.input<typeof anchorFileSchema>;

interface AnchorValidity {
  readonly validFrom?: Date;
  readonly validUntil?: Date;
}

export type TrustAnchor =
  | ({ readonly type: 'ds'; readonly record: DsRecord } & AnchorValidity)
  | ({ readonly type: 'dnskey'; readonly key: DnsKey } & AnchorValidity);

/**
 * Versioned, immutable set of trust anchors. Rollovers are handled by
 * holding old and new anchors side by side with their validity windows.
 */
export interface TrustAnchorSet {
  readonly version: string;
  readonly anchors: readonly TrustAnchor[];
}

function anchorZone(anchor: TrustAnchor): string {
  return anchor.type === 'ds' ? anchor.record.zone : anchor.key.zone;
}

export function createTrustAnchorSet(input: unknown): TrustAnchorSet {
  const parsed = anchorFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid trust anchors: ${issues.join('; ')}`);
  }

  const anchors = parsed.data.anchors.map((entry): TrustAnchor => {
    const window: AnchorValidity = {
      validFrom: entry.validFrom ? new Date(entry.validFrom) : undefined,
      validUntil: entry.validUntil ? new Date(entry.validUntil) : undefined,
    };
    const zone = normalizeName(entry.zone);
    if (entry.type === 'ds') {
      return Object.freeze({
        type: 'ds' as const,
        record: {
          zone,
          keyTag: entry.keyTag,
          algorithm: entry.algorithm,
          digestType: entry.digestType,
          digest: Buffer.from(entry.digest, 'hex'),
          ttl: 0,
        },
        ...window,
      });
    }
    const fields = {
      flags: entry.flags,
      protocol: entry.protocol,
      algorithm: entry.algorithm,
      publicKey: Buffer.from(entry.publicKey, 'base64'),
    };
    return Object.freeze({
      type: 'dnskey' as const,
      key: { zone, ...fields, keyTag: computeKeyTag(encodeDnsKeyRdata(fields), entry.algorithm), ttl: 0 },
      ...window,
    });
  });

  return Object.freeze({ version: parsed.data.version, anchors: Object.freeze(anchors) });
}

export function loadTrustAnchors(path: string = DEFAULT_TRUST_ANCHORS_PATH): TrustAnchorSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Unable to read trust anchors from ${path}`, { cause: error });
  }
  const set = createTrustAnchorSet(raw);
  logger.debug('Trust anchors loaded', { path, version: set.version, count: set.anchors.length });
  return set;
}

/** Anchors for `zone` whose validity window contains `now` */
export function anchorsFor(set: TrustAnchorSet, zone: string, now: Date): TrustAnchor[] {
  const name = normalizeName(zone);
  const time = now.getTime();
  return set.anchors.filter(
    (anchor) =>
      anchorZone(anchor) === name &&
      (!anchor.validFrom || anchor.validFrom.getTime() <= time) &&
      (!anchor.validUntil || time < anchor.validUntil.getTime()),
  );
}

export function hasTrustAnchor(set: TrustAnchorSet, zone: string, now: Date): boolean {
  return anchorsFor(set, zone, now).length > 0;
}

/** Bind a zone's published keys to its configured anchors */
export function matchTrustAnchor(set: TrustAnchorSet, zone: string, keys: readonly DnsKey[], now: Date): KeyBinding {
  const anchors = anchorsFor(set, zone, now);
  if (anchors.length === 0) {
    return { matched: false, reason: `No trust anchor configured for ${normalizeName(zone)}`, unsupported: false };
  }

  for (const anchor of anchors) {
    if (anchor.type !== 'dnskey') {
      continue;
    }
    const expected = encodeDnsKeyRdata(anchor.key);
    const key = keys.find((candidate) => encodeDnsKeyRdata(candidate).equals(expected));
    if (key) {
      return { matched: true, key };
    }
  }

  const dsAnchors = anchors.flatMap((anchor) => (anchor.type === 'ds' ? [anchor.record] : []));
  if (dsAnchors.length === 0) {
    return {
      matched: false,
      reason: `No published DNSKEY at ${normalizeName(zone)} matches a trust anchor`,
      unsupported: false,
    };
  }
  return matchDs(keys, dsAnchors);
}
