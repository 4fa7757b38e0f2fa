import { CLASS_IN, Rcode, RecordType, rcodeName, recordTypeName } from './dns/constants.js';
import { normalizeName } from './dns/name.js';
import {
  collectRRset,
  collectSignatures,
  parseDnsKey,
  parseDs,
  parseRrsig,
  parseTlsa,
  type DnsKey,
  type DsRecord,
  type RRset,
  type RrsigRecord,
  type TlsaRecord,
} from './dns/records.js';
import type { DnsTransport } from './dns/transport.js';
import type { DnsMessage } from './dns/wire.js';
import { DeadlineExceededError, NetworkError, NotFoundError, ProtocolError, toError } from './errors.js';
import { logger, type Logger } from './logger.js';

export type FetchError = NetworkError | ProtocolError | NotFoundError;

export type FetchResult<T> =
  | { ok: true; rrset: RRset; records: T[]; signatures: RrsigRecord[] }
  | { ok: false; error: FetchError };

/** Wall-clock budget shared by every query of one validation run */
export class Deadline {
  private readonly expiresAt: number;

  constructor(
    budgetMs: number,
    private readonly clock: () => number = Date.now,
  ) {
    this.expiresAt = clock() + budgetMs;
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.clock());
  }

  expired(): boolean {
    return this.remaining() === 0;
  }
}

export interface RecordFetcherOptions {
  timeoutMs: number;
  retries: number;
  deadline: Deadline;
  logger?: Logger;
}

function soaOwner(message: DnsMessage): string | undefined {
  const soa = message.authority.find((record) => record.type === RecordType.SOA);
  return soa ? normalizeName(soa.name) : undefined;
}

/**
 * Fetches one RRset and its signatures at a time. Holds no cache; a new
 * fetcher is made for every validation run.
 */
export class RecordFetcher {
  private readonly log: Logger;

  constructor(
    private readonly transport: DnsTransport,
    private readonly options: RecordFetcherOptions,
  ) {
    this.log = options.logger ?? logger;
  }

  fetchDnsKeys(zone: string): Promise<FetchResult<DnsKey>> {
    return this.fetch(zone, RecordType.DNSKEY, parseDnsKey);
  }

  fetchDs(zone: string): Promise<FetchResult<DsRecord>> {
    return this.fetch(zone, RecordType.DS, parseDs);
  }

  fetchTlsa(name: string): Promise<FetchResult<TlsaRecord>> {
    return this.fetch(name, RecordType.TLSA, parseTlsa);
  }

  fetchRrsigs(name: string): Promise<FetchResult<RrsigRecord>> {
    return this.fetch(name, RecordType.RRSIG, parseRrsig);
  }

  private async fetch<T>(
    name: string,
    type: number,
    parse: (owner: string, data: Buffer, ttl: number) => T,
  ): Promise<FetchResult<T>> {
    const owner = normalizeName(name);
    const attempts = this.options.retries + 1;

    for (let attempt = 1; ; attempt++) {
      if (this.options.deadline.expired()) {
        return {
          ok: false,
          error: new DeadlineExceededError(`Deadline exceeded before ${recordTypeName(type)} query for ${owner}`),
        };
      }
      const timeoutMs = Math.min(this.options.timeoutMs, this.options.deadline.remaining());

      let response: DnsMessage;
      try {
        response = await this.transport.query(owner, type, { timeoutMs });
      } catch (error) {
        const failure =
          error instanceof NetworkError || error instanceof ProtocolError
            ? error
            : new NetworkError('unreachable', toError(error).message, { cause: error });
        if (failure instanceof NetworkError && failure.retryable && attempt < attempts) {
          this.log.debug('Retrying DNS query after timeout', { name: owner, type: recordTypeName(type), attempt });
          continue;
        }
        return { ok: false, error: failure };
      }

      return this.classify(owner, type, response, parse);
    }
  }

  private classify<T>(
    owner: string,
    type: number,
    response: DnsMessage,
    parse: (owner: string, data: Buffer, ttl: number) => T,
  ): FetchResult<T> {
    const typeName = recordTypeName(type);

    switch (response.rcode) {
      case Rcode.NOERROR:
        break;
      case Rcode.SERVFAIL:
        return { ok: false, error: new ProtocolError('servfail', `SERVFAIL for ${typeName} ${owner}`) };
      case Rcode.NXDOMAIN:
        return {
          ok: false,
          error: new NotFoundError('nxdomain', `${owner} does not exist`, soaOwner(response)),
        };
      default:
        return {
          ok: false,
          error: new ProtocolError('refused', `${rcodeName(response.rcode)} for ${typeName} ${owner}`),
        };
    }

    if (response.flags.tc) {
      return { ok: false, error: new ProtocolError('malformed', `Truncated response for ${typeName} ${owner}`) };
    }

    const rrset = collectRRset(response.answers, owner, type);
    if (!rrset) {
      return {
        ok: false,
        error: new NotFoundError('nodata', `No ${typeName} records at ${owner}`, soaOwner(response)),
      };
    }

    try {
      const records = response.answers
        .filter((record) => record.type === type && record.class === CLASS_IN && normalizeName(record.name) === owner)
        .map((record) => parse(owner, record.data, record.ttl));
      const signatures = type === RecordType.RRSIG ? [] : collectSignatures(response.answers, owner, type);
      return { ok: true, rrset, records, signatures };
    } catch (error) {
      const failure =
        error instanceof ProtocolError
          ? error
          : new ProtocolError('malformed', `Unparseable ${typeName} at ${owner}`, { cause: error });
      return { ok: false, error: failure };
    }
  }
}
