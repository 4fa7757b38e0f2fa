import { afterEach, describe, expect, it, vi } from 'vitest';
import type { AnalyticsEvent, AnalyticsSink } from '../src/analytics.js';
import { loadConfig } from '../src/config.js';
import { RecordType } from '../src/dns/constants.js';
import type { DnsMessage } from '../src/dns/wire.js';
import type { DnsTransport, TransportQueryOptions } from '../src/dns/transport.js';
import { InvalidDomainError } from '../src/errors.js';
import { logger } from '../src/logger.js';
import { createValidator, DnssecValidator, type ValidatorSettings } from '../src/validator.js';
import { FakeCertificateClient, LEAF_SPKI_SHA256, certificateDer } from './certificate-fixtures.js';
import { NOW, SignedHierarchy, bonditHierarchy } from './signed-zone-helper.js';

const settings: ValidatorSettings = {
  queryTimeoutMs: 1000,
  queryRetries: 0,
  validationDeadlineMs: 10_000,
  tlsTimeoutMs: 500,
  bulkMaxDomains: 10,
  bulkConcurrency: 3,
};

class RecordingSink implements AnalyticsSink {
  readonly events: AnalyticsEvent[] = [];

  record(event: AnalyticsEvent): void {
    this.events.push(event);
  }
}

/** Delays every answer and tracks how many queries are in flight at once */
class SlowTransport implements DnsTransport {
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly inner: DnsTransport) {}

  async query(name: string, type: number, options: TransportQueryOptions): Promise<DnsMessage> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return await this.inner.query(name, type, options);
    } finally {
      this.inFlight--;
    }
  }
}

/** Holds back the answer to one query, whatever timeout the caller asked for */
class StallingTransport implements DnsTransport {
  constructor(
    private readonly inner: DnsTransport,
    private readonly stall: { name: string; type: number; delayMs: number },
  ) {}

  async query(name: string, type: number, options: TransportQueryOptions): Promise<DnsMessage> {
    if (name === this.stall.name && type === this.stall.type) {
      await new Promise((resolve) => setTimeout(resolve, this.stall.delayMs));
    }
    return this.inner.query(name, type, options);
  }
}

function validatorFor(hierarchy: SignedHierarchy, overrides: Partial<ValidatorSettings> = {}, analytics?: AnalyticsSink) {
  return new DnssecValidator(
    {
      transport: hierarchy.transport,
      certificateClient: new FakeCertificateClient({
        certificates: [certificateDer('leaf.pem'), certificateDer('ca.pem')],
        pkixAuthorized: false,
      }),
      trustAnchors: hierarchy.trustAnchors(),
      clock: () => NOW,
      analytics,
    },
    { ...settings, ...overrides },
  );
}

describe('DnssecValidator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('validate', () => {
    it('should return the partial chain when the deadline runs out mid-walk', async () => {
      const hierarchy = bonditHierarchy();
      const validator = new DnssecValidator(
        {
          transport: new StallingTransport(hierarchy.transport, { name: 'dk.', type: RecordType.DNSKEY, delayMs: 400 }),
          certificateClient: new FakeCertificateClient(new Error('unused')),
          trustAnchors: hierarchy.trustAnchors(),
          clock: () => NOW,
        },
        { ...settings, validationDeadlineMs: 200 },
      );

      const result = await validator.validate('bondit.dk');

      expect(result.status).toBe('indeterminate');
      expect(result.chain_of_trust).toEqual([
        { zone: '.', status: 'valid', algorithm: 13, key_tag: hierarchy.zone('.').ksk.dnskey.keyTag },
        { zone: 'dk.', status: 'indeterminate', error: 'Deadline exceeded before DS query for dk.' },
      ]);
      expect(result.errors).toEqual(['Deadline exceeded before DS query for dk.']);
    });

    it('should validate a fully signed domain', async () => {
      const hierarchy = bonditHierarchy();

      const result = await validatorFor(hierarchy).validate('Bondit.DK');

      expect(result.domain).toBe('bondit.dk.');
      expect(result.status).toBe('valid');
      expect(result.validation_time).toBe('2025-06-01T12:00:00.000Z');
      expect(result.chain_of_trust.map((link) => link.zone)).toEqual(['.', 'dk.', 'bondit.dk.']);
      expect(result.errors).toEqual([]);
      expect(result.tlsa_summary).toBeUndefined();
    });

    it('should give equal results for repeated validations', async () => {
      const validator = validatorFor(bonditHierarchy());

      const first = await validator.validate('bondit.dk');
      const second = await validator.validate('bondit.dk');

      expect(second).toEqual(first);
    });

    it('should return an error result for an unusable domain', async () => {
      const hierarchy = bonditHierarchy();

      const result = await validatorFor(hierarchy).validate('bondit..dk');

      expect(result).toEqual({
        domain: 'bondit..dk',
        status: 'error',
        validation_time: '2025-06-01T12:00:00.000Z',
        chain_of_trust: [],
        records: { dnskey: [], ds: [], rrsig: [] },
        errors: ['Empty label in bondit..dk'],
      });
      expect(hierarchy.transport.queries).toEqual([]);
    });

    it('should include the DANE outcome when asked', async () => {
      const hierarchy = bonditHierarchy();
      hierarchy.addTlsa('_443._tcp.bondit.dk.', [
        { usage: 3, selector: 1, matchingType: 1, certificateAssociationData: Buffer.from(LEAF_SPKI_SHA256, 'hex') },
      ]);

      const { result, tlsa } = await validatorFor(hierarchy).inspect('bondit.dk', { tlsa: true });

      expect(result.status).toBe('valid');
      expect(result.tlsa_summary).toEqual({
        status: 'valid',
        records_found: 1,
        dane_status: 'valid',
        message: '1 of 1 TLSA records match the server certificate',
      });
      expect(tlsa?.associations[0].matched).toBe(true);
      expect(tlsa?.certificate?.subject).toBe('CN=bondit.dk');
      expect(tlsa?.analysis.security_assessment.overall_score).toBe(90);
    });

    it('should lower a valid chain to insecure when no TLSA records exist', async () => {
      const result = await validatorFor(bonditHierarchy()).validate('bondit.dk', { tlsa: true });

      expect(result.status).toBe('insecure');
      expect(result.tlsa_summary?.dane_status).toBe('no-tlsa');
      expect(result.chain_of_trust.every((link) => link.status === 'valid')).toBe(true);
    });

    it('should not look for TLSA records unless asked', async () => {
      const hierarchy = bonditHierarchy();

      const { tlsa } = await validatorFor(hierarchy).inspect('bondit.dk');

      expect(tlsa).toBeUndefined();
      expect(hierarchy.transport.queries.some((query) => query.name.startsWith('_443.'))).toBe(false);
    });
  });

  describe('analytics', () => {
    it('should record one event per validation', async () => {
      const sink = new RecordingSink();
      const validator = validatorFor(bonditHierarchy(), {}, sink);

      await validator.validate('bondit.dk');
      await validator.validate('bad..name', { source: 'cli' });

      expect(sink.events).toEqual([
        { domain: 'bondit.dk.', status: 'valid', source: 'api', timestamp: NOW },
        { domain: 'bad..name', status: 'error', source: 'cli', timestamp: NOW },
      ]);
    });

    it('should not fail validation when the sink throws', async () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const sink: AnalyticsSink = {
        record: () => {
          throw new Error('disk full');
        },
      };

      const result = await validatorFor(bonditHierarchy(), {}, sink).validate('bondit.dk');

      expect(result.status).toBe('valid');
      expect(warn).toHaveBeenCalledWith(
        'Analytics sink failed',
        expect.objectContaining({ domain: 'bondit.dk.', source: 'api' }),
      );
    });

    it('should not fail validation when an async sink rejects', async () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const sink: AnalyticsSink = { record: () => Promise.reject(new Error('connection lost')) };

      const result = await validatorFor(bonditHierarchy(), {}, sink).validate('bondit.dk');

      expect(result.status).toBe('valid');
      await vi.waitFor(() => expect(warn).toHaveBeenCalledTimes(1));
    });
  });

  describe('validateMany', () => {
    it('should keep input order and summarise statuses', async () => {
      const validator = validatorFor(bonditHierarchy());

      const { results, summary } = await validator.validateMany(['bondit.dk', 'bad..name', 'missing.bondit.dk']);

      expect(results.map((result) => [result.domain, result.status])).toEqual([
        ['bondit.dk.', 'valid'],
        ['bad..name', 'error'],
        ['missing.bondit.dk.', 'indeterminate'],
      ]);
      expect(summary).toEqual({
        total: 3,
        valid: 1,
        insecure: 0,
        bogus: 0,
        indeterminate: 1,
        error: 1,
        processing_time_ms: expect.any(Number),
      });
    });

    it('should tag analytics events as bulk', async () => {
      const sink = new RecordingSink();

      await validatorFor(bonditHierarchy(), {}, sink).validateMany(['bondit.dk']);

      expect(sink.events.map((event) => event.source)).toEqual(['bulk']);
    });

    it('should reject an empty list', async () => {
      await expect(validatorFor(bonditHierarchy()).validateMany([])).rejects.toThrow(
        new InvalidDomainError('At least one domain is required'),
      );
    });

    it('should reject more domains than allowed', async () => {
      const hierarchy = bonditHierarchy();
      const validator = validatorFor(hierarchy, { bulkMaxDomains: 2 });

      await expect(validator.validateMany(['a.dk', 'b.dk', 'c.dk'])).rejects.toThrow('Too many domains: 3 (maximum 2)');
      expect(hierarchy.transport.queries).toHaveLength(0);
    });

    it('should keep at most `concurrency` validations in flight', async () => {
      const hierarchy = bonditHierarchy();
      const transport = new SlowTransport(hierarchy.transport);
      const validator = new DnssecValidator(
        {
          transport,
          certificateClient: new FakeCertificateClient(new Error('unused')),
          trustAnchors: hierarchy.trustAnchors(),
          clock: () => NOW,
        },
        settings,
      );
      const domains = ['bondit.dk', 'www.bondit.dk', 'dk', 'bondit.dk', 'dk', 'bondit.dk'];

      await validator.validateMany(domains, { concurrency: 2 });
      expect(transport.maxInFlight).toBe(2);

      transport.maxInFlight = 0;
      await validator.validateMany(domains, { parallel: false });
      expect(transport.maxInFlight).toBe(1);
    });
  });
});

describe('createValidator', () => {
  it('should use the given collaborators', async () => {
    const hierarchy = bonditHierarchy();
    const validator = createValidator(loadConfig({}), {
      transport: hierarchy.transport,
      trustAnchors: hierarchy.trustAnchors(),
      clock: () => NOW,
    });

    const result = await validator.validate('bondit.dk');
    expect(result.status).toBe('valid');
  });

  it('should fall back to the bundled root trust anchors', async () => {
    const hierarchy = bonditHierarchy();
    const validator = createValidator(loadConfig({}), { transport: hierarchy.transport, clock: () => NOW });

    const result = await validator.validate('bondit.dk');

    // The generated test root key is not the real root KSK
    expect(result.status).toBe('bogus');
    expect(result.chain_of_trust).toEqual([
      { zone: '.', status: 'bogus', error: 'No DNSKEY at . matches DS key tag 20326, 38696' },
    ]);
  });
});
