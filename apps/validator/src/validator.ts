import { dispatchAnalytics, type AnalyticsSink } from './analytics.js';
import type { AppConfig } from './config.js';
import { parseDomain, type Domain } from './dns/name.js';
import { UpstreamTransport, type DnsTransport } from './dns/transport.js';
import { loadTrustAnchors, type TrustAnchorSet } from './dnssec/trust-anchors.js';
import { InvalidDomainError, logError, sanitizeErrorMessage } from './errors.js';
import { logger, type Logger } from './logger.js';
import { recordValidation } from './metrics.js';
import { Deadline, RecordFetcher } from './record-fetcher.js';
import { aggregateResult, errorResult, type FrozenValidationResult, type ResultStatus } from './result.js';
import { TlsCertificateClient, type CertificateClient } from './tlsa/certificate.js';
import { TlsaValidator, type TlsaReport } from './tlsa/tlsa-validator.js';
import { ZoneWalker } from './zone-walker.js';

export interface ValidatorDependencies {
  transport: DnsTransport;
  certificateClient: CertificateClient;
  trustAnchors: TrustAnchorSet;
  /** Time used for signature validity windows and `validation_time` */
  clock?: () => Date;
  analytics?: AnalyticsSink;
  logger?: Logger;
}

export interface ValidatorSettings {
  queryTimeoutMs: number;
  queryRetries: number;
  validationDeadlineMs: number;
  tlsTimeoutMs: number;
  bulkMaxDomains: number;
  bulkConcurrency: number;
}

export interface ValidateOptions {
  /** Also run the DANE check for the domain's HTTPS service */
  tlsa?: boolean;
  /** TLSA port, 443 by default */
  port?: number;
  /** Recorded with the analytics event */
  source?: string;
}

export interface BulkOptions extends ValidateOptions {
  /** Run validations one at a time when false */
  parallel?: boolean;
  concurrency?: number;
}

export interface BulkSummary {
  total: number;
  valid: number;
  insecure: number;
  bogus: number;
  indeterminate: number;
  error: number;
  processing_time_ms: number;
}

export interface BulkResult {
  results: FrozenValidationResult[];
  summary: BulkSummary;
}

export interface Inspection {
  result: FrozenValidationResult;
  /** Full DANE analysis when TLSA was requested */
  tlsa?: TlsaReport;
}

async function runWithConcurrencyLimit(tasks: Array<() => Promise<void>>, limit: number): Promise<void> {
  if (tasks.length === 0) {
    return;
  }

  let nextTaskIndex = 0;
  const workerCount = Math.max(1, Math.min(limit, tasks.length));

  async function runWorker(): Promise<void> {
    while (nextTaskIndex < tasks.length) {
      const taskIndex = nextTaskIndex;
      nextTaskIndex += 1;
      await tasks[taskIndex]();
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
}

/**
 * Validates domains against the DNSSEC chain of trust. Every call builds its
 * own fetcher and deadline, so concurrent calls share nothing but the
 * injected collaborators.
 */
export class DnssecValidator {
  private readonly clock: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly deps: ValidatorDependencies,
    private readonly settings: ValidatorSettings,
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.logger ?? logger;
  }

  /** Never throws: unusable input and unexpected failures give an `error` result */
  async validate(input: string, options: ValidateOptions = {}): Promise<FrozenValidationResult> {
    const { result } = await this.inspect(input, options);
    return result;
  }

  /** Like `validate`, also returning the detailed DANE report */
  async inspect(input: string, options: ValidateOptions = {}): Promise<Inspection> {
    const startTime = Date.now();
    const inspection = await this.run(input, options);
    const { result } = inspection;

    recordValidation({ status: result.status, tlsa: options.tlsa === true, durationMs: Date.now() - startTime });
    dispatchAnalytics(this.deps.analytics, {
      domain: result.domain,
      status: result.status,
      source: options.source ?? 'api',
      timestamp: new Date(result.validation_time),
    });
    this.log.info('Validation complete', {
      domain: result.domain,
      status: result.status,
      links: result.chain_of_trust.length,
      duration: `${Date.now() - startTime}ms`,
    });
    return inspection;
  }

  private async run(input: string, options: ValidateOptions): Promise<Inspection> {
    let domain: Domain;
    try {
      domain = parseDomain(input);
    } catch (error) {
      return { result: errorResult(input, sanitizeErrorMessage(error, 'Invalid domain'), this.clock()) };
    }

    const log = this.log.child({ domain: domain.name });
    try {
      const now = this.clock();
      const fetcher = new RecordFetcher(this.deps.transport, {
        timeoutMs: this.settings.queryTimeoutMs,
        retries: this.settings.queryRetries,
        deadline: new Deadline(this.settings.validationDeadlineMs),
        logger: log,
      });
      const walk = await new ZoneWalker(fetcher, this.deps.trustAnchors, log).walk(domain, now);

      let tlsa: TlsaReport | undefined;
      if (options.tlsa) {
        const tlsaValidator = new TlsaValidator(
          fetcher,
          this.deps.certificateClient,
          { tlsTimeoutMs: this.settings.tlsTimeoutMs, port: options.port },
          log,
        );
        tlsa = await tlsaValidator.validate(domain, walk, now);
      }

      const result = aggregateResult({
        domain: domain.name,
        chain: walk.chain,
        records: walk.records,
        errors: walk.errors,
        tlsa: tlsa?.summary,
        validationTime: this.clock(),
      });
      return tlsa ? { result, tlsa } : { result };
    } catch (error) {
      logError(error, { domain: domain.name });
      return { result: errorResult(domain.name, sanitizeErrorMessage(error, 'Validation failed'), this.clock()) };
    }
  }

  /**
   * Validate several domains through a bounded pool. Results keep input order,
   * and a domain that cannot be validated still gets its own `error` result.
   *
   * This is the one entry point that rejects: an empty list or one longer than
   * `bulkMaxDomains` is refused as a whole with InvalidDomainError, before any
   * domain is looked at.
   */
  async validateMany(domains: readonly string[], options: BulkOptions = {}): Promise<BulkResult> {
    if (domains.length === 0) {
      throw new InvalidDomainError('At least one domain is required');
    }
    if (domains.length > this.settings.bulkMaxDomains) {
      throw new InvalidDomainError(`Too many domains: ${domains.length} (maximum ${this.settings.bulkMaxDomains})`);
    }

    const startTime = Date.now();
    const { parallel = true, concurrency = this.settings.bulkConcurrency, ...validateOptions } = options;
    const results = new Array<FrozenValidationResult>(domains.length);
    const tasks = domains.map((domain, index) => async () => {
      results[index] = await this.validate(domain, { source: 'bulk', ...validateOptions });
    });
    await runWithConcurrencyLimit(tasks, parallel ? concurrency : 1);

    const counts: Record<ResultStatus, number> = { valid: 0, insecure: 0, bogus: 0, indeterminate: 0, error: 0 };
    for (const result of results) {
      counts[result.status] += 1;
    }
    return {
      results,
      summary: { total: results.length, ...counts, processing_time_ms: Date.now() - startTime },
    };
  }
}

/** Wire the production collaborators from configuration */
export function createValidator(config: AppConfig, overrides: Partial<ValidatorDependencies> = {}): DnssecValidator {
  return new DnssecValidator(
    {
      transport: overrides.transport ?? new UpstreamTransport(config.upstreams),
      certificateClient: overrides.certificateClient ?? new TlsCertificateClient(),
      trustAnchors: overrides.trustAnchors ?? loadTrustAnchors(config.trustAnchorsPath),
      clock: overrides.clock,
      analytics: overrides.analytics,
      logger: overrides.logger,
    },
    {
      queryTimeoutMs: config.queryTimeoutMs,
      queryRetries: config.queryRetries,
      validationDeadlineMs: config.validationDeadlineMs,
      tlsTimeoutMs: config.tlsTimeoutMs,
      bulkMaxDomains: config.bulkMaxDomains,
      bulkConcurrency: config.bulkConcurrency,
    },
  );
}
