import { describe, expect, it } from 'vitest';
import { RecordType } from '../../src/dns/constants.js';
import { parseDomain } from '../../src/dns/name.js';
import { encodeTlsaRdata } from '../../src/dns/records.js';
import { NetworkError } from '../../src/errors.js';
import { Deadline, RecordFetcher } from '../../src/record-fetcher.js';
import type { CertificateClient, PresentedChain } from '../../src/tlsa/certificate.js';
import { daneToChainStatus, tlsaOwnerName, TlsaValidator } from '../../src/tlsa/tlsa-validator.js';
import { ZoneWalker } from '../../src/zone-walker.js';
import { CA_SPKI_SHA256, FakeCertificateClient, LEAF_SPKI_SHA256, certificateDer } from '../certificate-fixtures.js';
import { NOW, SignedHierarchy, bonditHierarchy, record } from '../signed-zone-helper.js';

const presentedChain: PresentedChain = {
  certificates: [certificateDer('leaf.pem'), certificateDer('ca.pem')],
  pkixAuthorized: false,
  authorizationError: 'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
};

const leafSpki = { usage: 3, selector: 1, matchingType: 1, certificateAssociationData: Buffer.from(LEAF_SPKI_SHA256, 'hex') };

async function runTlsa(hierarchy: SignedHierarchy, domain: string, client: CertificateClient, port?: number) {
  const fetcher = new RecordFetcher(hierarchy.transport, { timeoutMs: 1000, retries: 0, deadline: new Deadline(10_000) });
  const name = parseDomain(domain);
  const walk = await new ZoneWalker(fetcher, hierarchy.trustAnchors()).walk(name, NOW);
  return new TlsaValidator(fetcher, client, { tlsTimeoutMs: 500, port }).validate(name, walk, NOW);
}

describe('tlsaOwnerName', () => {
  it('should prefix the port and protocol labels', () => {
    expect(tlsaOwnerName('bondit.dk')).toBe('_443._tcp.bondit.dk.');
    expect(tlsaOwnerName('Mail.Example.com.', 25)).toBe('_25._tcp.mail.example.com.');
    expect(tlsaOwnerName('example.com', 853, 'udp')).toBe('_853._udp.example.com.');
  });
});

describe('daneToChainStatus', () => {
  it.each([
    ['valid', 'valid', 'valid'],
    ['invalid', 'valid', 'bogus'],
    ['no-tlsa', 'valid', 'insecure'],
    ['dnssec-required', 'insecure', 'insecure'],
    ['dnssec-required', 'bogus', 'bogus'],
    ['cert-unavailable', 'valid', 'indeterminate'],
    ['indeterminate', 'valid', 'indeterminate'],
  ] as const)('should map %s with a %s TLSA RRset to %s', (dane, dnssec, expected) => {
    expect(daneToChainStatus(dane, dnssec)).toBe(expected);
  });
});

describe('TlsaValidator', () => {
  it('should validate a DANE-EE record against the served certificate', async () => {
    const hierarchy = bonditHierarchy();
    hierarchy.addTlsa('_443._tcp.bondit.dk.', [leafSpki]);
    const client = new FakeCertificateClient(presentedChain);

    const report = await runTlsa(hierarchy, 'bondit.dk', client);

    expect(report.summary).toEqual({
      status: 'valid',
      records_found: 1,
      dane_status: 'valid',
      message: '1 of 1 TLSA records match the server certificate',
    });
    expect(report.name).toBe('_443._tcp.bondit.dk.');
    expect(report.dnssec_status).toBe('valid');
    expect(report.records).toEqual([
      {
        usage: 3,
        selector: 1,
        matching_type: 1,
        usage_name: 'DANE-EE',
        selector_name: 'SPKI',
        matching_type_name: 'SHA-256',
        association_data: LEAF_SPKI_SHA256,
      },
    ]);
    expect(report.certificate?.subject).toBe('CN=bondit.dk');
    expect(report.certificate?.chain_length).toBe(2);
    expect(report.analysis.security_assessment.overall_score).toBe(90);
    expect(report.analysis.troubleshooting).toEqual([]);
    expect(client.calls).toEqual([{ host: 'bondit.dk', port: 443, options: { timeoutMs: 500 } }]);
  });

  it('should report a mismatch as invalid', async () => {
    const hierarchy = bonditHierarchy();
    hierarchy.addTlsa('_443._tcp.bondit.dk.', [
      { ...leafSpki, certificateAssociationData: Buffer.alloc(32, 0xaa) },
      { usage: 3, selector: 1, matchingType: 1, certificateAssociationData: Buffer.from(CA_SPKI_SHA256, 'hex') },
    ]);

    const report = await runTlsa(hierarchy, 'bondit.dk', new FakeCertificateClient(presentedChain));

    expect(report.summary).toEqual({
      status: 'bogus',
      records_found: 2,
      dane_status: 'invalid',
      message: 'None of 2 TLSA records match the server certificate',
    });
    expect(report.associations.map((association) => association.matched)).toEqual([false, false]);
  });

  it('should report a missing TLSA RRset as no-tlsa', async () => {
    const client = new FakeCertificateClient(presentedChain);

    const report = await runTlsa(bonditHierarchy(), 'bondit.dk', client);

    expect(report.summary).toEqual({
      status: 'insecure',
      records_found: 0,
      dane_status: 'no-tlsa',
      message: 'No TLSA records found at _443._tcp.bondit.dk.',
    });
    expect(client.calls).toEqual([]);
  });

  it('should look up the requested port', async () => {
    const hierarchy = bonditHierarchy();
    hierarchy.addTlsa('_25._tcp.bondit.dk.', [leafSpki]);
    const client = new FakeCertificateClient(presentedChain);

    const report = await runTlsa(hierarchy, 'bondit.dk', client, 25);

    expect(report.name).toBe('_25._tcp.bondit.dk.');
    expect(report.summary.dane_status).toBe('valid');
    expect(client.calls[0].port).toBe(25);
  });

  it('should require a validated chain before trusting TLSA records', async () => {
    const hierarchy = new SignedHierarchy();
    hierarchy.addSignedZone('.', { splitKeys: true });
    hierarchy.addSignedZone('com.', { splitKeys: true });
    hierarchy.addUnsignedZone('example.com.');
    hierarchy.transport.addRecords(record('_443._tcp.example.com.', RecordType.TLSA, encodeTlsaRdata(leafSpki)));
    const client = new FakeCertificateClient(presentedChain);

    const report = await runTlsa(hierarchy, 'example.com', client);

    expect(report.summary).toEqual({
      status: 'insecure',
      records_found: 1,
      dane_status: 'dnssec-required',
      message: 'TLSA records need a validated DNSSEC chain: Chain of trust is insecure',
    });
    expect(report.dnssec_status).toBe('insecure');
    expect(client.calls).toEqual([]);
  });

  it('should treat unsigned TLSA records in a signed zone as bogus', async () => {
    const hierarchy = bonditHierarchy();
    hierarchy.transport.addRecords(record('_443._tcp.bondit.dk.', RecordType.TLSA, encodeTlsaRdata(leafSpki)));

    const report = await runTlsa(hierarchy, 'bondit.dk', new FakeCertificateClient(presentedChain));

    expect(report.summary.status).toBe('bogus');
    expect(report.summary.message).toBe('TLSA records need a validated DNSSEC chain: TLSA records are not signed');
  });

  it('should treat a TLSA RRset with a broken signature as bogus', async () => {
    const hierarchy = bonditHierarchy();
    hierarchy.addTlsa('_443._tcp.bondit.dk.', [leafSpki]);
    hierarchy.transport.corruptSignatures('_443._tcp.bondit.dk.', RecordType.TLSA);
    const keyTag = hierarchy.zone('bondit.dk.').zsk.dnskey.keyTag;

    const report = await runTlsa(hierarchy, 'bondit.dk', new FakeCertificateClient(presentedChain));

    expect(report.dnssec_status).toBe('bogus');
    expect(report.summary.message).toBe(
      `TLSA records need a validated DNSSEC chain: TLSA at _443._tcp.bondit.dk.: RRSIG ${keyTag}/13 signature does not verify`,
    );
  });

  it('should be indeterminate when the certificate cannot be retrieved', async () => {
    const hierarchy = bonditHierarchy();
    hierarchy.addTlsa('_443._tcp.bondit.dk.', [leafSpki]);
    const client = new FakeCertificateClient(
      new NetworkError('timeout', 'TLS handshake with bondit.dk:443 timed out after 500ms'),
    );

    const report = await runTlsa(hierarchy, 'bondit.dk', client);

    expect(report.summary).toEqual({
      status: 'indeterminate',
      records_found: 1,
      dane_status: 'cert-unavailable',
      message: 'Unable to retrieve certificate from bondit.dk:443: TLS handshake with bondit.dk:443 timed out after 500ms',
    });
    expect(report.dnssec_status).toBe('valid');
  });

  it('should be indeterminate when the TLSA lookup fails', async () => {
    const hierarchy = bonditHierarchy();
    hierarchy.transport.failWith(
      '_443._tcp.bondit.dk.',
      RecordType.TLSA,
      () => new NetworkError('unreachable', 'No upstream resolver answered'),
    );

    const report = await runTlsa(hierarchy, 'bondit.dk', new FakeCertificateClient(presentedChain));

    expect(report.summary).toEqual({
      status: 'indeterminate',
      records_found: 0,
      dane_status: 'indeterminate',
      message: 'TLSA lookup failed: No upstream resolver answered',
    });
  });
});
