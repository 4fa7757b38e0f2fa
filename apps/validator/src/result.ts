import { z } from 'zod';
import { dnsKeyView, dsView, rrsigView, type DnsKeyView, type DsView, type RrsigView } from './dns/records.js';
import { worstStatus, type LinkStatus } from './status.js';
import type { TlsaSummary } from './tlsa/tlsa-validator.js';
import type { ChainLink, CollectedRecords } from './zone-walker.js';

export type ResultStatus = LinkStatus | 'error';

export interface ValidationResult {
  domain: string;
  status: ResultStatus;
  validation_time: string;
  chain_of_trust: ChainLink[];
  records: {
    dnskey: DnsKeyView[];
    ds: DsView[];
    rrsig: RrsigView[];
  };
  tlsa_summary?: TlsaSummary;
  errors: string[];
}

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenValidationResult = DeepReadonly<ValidationResult>;

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export interface AggregateInput {
  domain: string;
  chain: readonly ChainLink[];
  records: CollectedRecords;
  errors: readonly string[];
  tlsa?: TlsaSummary;
  validationTime: Date;
}

function copyLink(link: ChainLink): ChainLink {
  const copy: ChainLink = { zone: link.zone, status: link.status };
  if (link.algorithm !== undefined) {
    copy.algorithm = link.algorithm;
  }
  if (link.key_tag !== undefined) {
    copy.key_tag = link.key_tag;
  }
  if (link.error !== undefined) {
    copy.error = link.error;
  }
  return copy;
}

/**
 * Combine the chain and the optional DANE summary into the reported result.
 * Pure: the same input always gives an equal, frozen result.
 */
export function aggregateResult(input: AggregateInput): FrozenValidationResult {
  const statuses = input.chain.map((link) => link.status);
  const errors = [...input.errors];
  if (input.tlsa) {
    statuses.push(input.tlsa.status);
    if (input.tlsa.status === 'bogus' || input.tlsa.status === 'indeterminate') {
      errors.push(`TLSA: ${input.tlsa.message}`);
    }
  }

  const result: ValidationResult = {
    domain: input.domain,
    status: input.chain.length === 0 ? 'indeterminate' : worstStatus(statuses),
    validation_time: input.validationTime.toISOString(),
    chain_of_trust: input.chain.map(copyLink),
    records: {
      dnskey: input.records.dnskey.map(dnsKeyView),
      ds: input.records.ds.map(dsView),
      rrsig: input.records.rrsig.map(rrsigView),
    },
    errors,
  };
  if (input.tlsa) {
    result.tlsa_summary = { ...input.tlsa };
  }
  return deepFreeze(result);
}

/** Result for input that could not be validated at all */
export function errorResult(domain: string, message: string, validationTime: Date): FrozenValidationResult {
  const result: ValidationResult = {
    domain,
    status: 'error',
    validation_time: validationTime.toISOString(),
    chain_of_trust: [],
    records: { dnskey: [], ds: [], rrsig: [] },
    errors: [message],
  };
  return deepFreeze(result);
}

const linkStatusSchema = z.enum(['valid', 'bogus', 'insecure', 'indeterminate']);

const resultSchema = z.object({
  domain: z.string(),
  status: z.enum(['valid', 'bogus', 'insecure', 'indeterminate', 'error']),
  validation_time: z.iso.datetime(),
  chain_of_trust: z.array(
    z.object({
      zone: z.string(),
      status: linkStatusSchema,
      algorithm: z.number().int().optional(),
      key_tag: z.number().int().optional(),
      error: z.string().optional(),
    }),
  ),
  records: z.object({
    dnskey: z.array(
      z.object({
        zone: z.string(),
        flags: z.number().int(),
        protocol: z.number().int(),
        algorithm: z.number().int(),
        key_tag: z.number().int(),
        public_key: z.string(),
      }),
    ),
    ds: z.array(
      z.object({
        zone: z.string(),
        key_tag: z.number().int(),
        algorithm: z.number().int(),
        digest_type: z.number().int(),
        digest: z.string(),
      }),
    ),
    rrsig: z.array(
      z.object({
        zone: z.string(),
        type_covered: z.string(),
        algorithm: z.number().int(),
        labels: z.number().int(),
        original_ttl: z.number().int(),
        expiration: z.number().int(),
        inception: z.number().int(),
        key_tag: z.number().int(),
        signer: z.string(),
      }),
    ),
  }),
  tlsa_summary: z
    .object({
      status: linkStatusSchema,
      records_found: z.number().int(),
      dane_status: z.enum(['valid', 'invalid', 'no-tlsa', 'dnssec-required', 'cert-unavailable', 'indeterminate']),
      message: z.string(),
    })
    .optional(),
  errors: z.array(z.string()),
});

export function serializeResult(result: FrozenValidationResult): string {
  return JSON.stringify(result);
}

/** Parse a serialized result back; throws a ZodError when the shape is wrong */
export function parseResult(json: string): FrozenValidationResult {
  const result: ValidationResult = resultSchema.parse(JSON.parse(json));
  return deepFreeze(result);
}
