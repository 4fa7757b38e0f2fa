import { createHash, X509Certificate, type KeyObject } from 'crypto';
import net from 'net';
import tls from 'tls';
import { NetworkError, ValidationError, toError } from '../errors.js';
import { logger } from '../logger.js';

/** Certificates presented in a TLS handshake, leaf first, as DER */
export interface PresentedChain {
  certificates: Buffer[];
  /** Whether the handshake verified against the system CA store */
  pkixAuthorized: boolean;
  authorizationError?: string;
}

export interface CertificateFetchOptions {
  timeoutMs: number;
  /** SNI host name; defaults to the connection host */
  servername?: string;
}

export interface CertificateClient {
  fetchChain(host: string, port: number, options: CertificateFetchOptions): Promise<PresentedChain>;
}

/**
 * Opens a TLS connection, records the presented chain and the PKIX verdict,
 * and closes it. Untrusted chains are kept: DANE decides trust, not the CA store.
 */
export class TlsCertificateClient implements CertificateClient {
  fetchChain(host: string, port: number, options: CertificateFetchOptions): Promise<PresentedChain> {
    return new Promise((resolve, reject) => {
      const servername = options.servername ?? host;
      let settled = false;

      const socket = tls.connect({
        host,
        port,
        servername: net.isIP(servername) ? undefined : servername,
        rejectUnauthorized: false,
        minVersion: 'TLSv1.2',
      });

      const finish = (outcome: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        outcome();
      };

      const timer = setTimeout(() => {
        const message = `TLS handshake with ${host}:${port} timed out after ${options.timeoutMs}ms`;
        finish(() => reject(new NetworkError('timeout', message)));
      }, options.timeoutMs);

      socket.on('secureConnect', () => {
        const certificates: Buffer[] = [];
        let current: tls.DetailedPeerCertificate | undefined = socket.getPeerCertificate(true);
        const seen = new Set<string>();
        while (current && current.raw && !seen.has(current.fingerprint256)) {
          seen.add(current.fingerprint256);
          certificates.push(Buffer.from(current.raw));
          current = current.issuerCertificate;
        }
        const authorizationError = socket.authorizationError ? String(socket.authorizationError) : undefined;
        finish(() => {
          if (certificates.length === 0) {
            reject(new NetworkError('unreachable', `${host}:${port} presented no certificate`));
            return;
          }
          resolve({ certificates, pkixAuthorized: socket.authorized, authorizationError });
        });
      });

      socket.on('error', (error) =>
        finish(() =>
          reject(
            new NetworkError('unreachable', `TLS connection to ${host}:${port} failed: ${toError(error).message}`, {
              cause: error,
            }),
          ),
        ),
      );
    });
  }
}

// Minimal DER walking, enough to lift fields out of a certificate verbatim

interface DerElement {
  tag: number;
  start: number;
  contentStart: number;
  end: number;
}

function readElement(der: Buffer, offset: number): DerElement {
  if (offset + 2 > der.length) {
    throw new ValidationError('Truncated DER element');
  }
  const tag = der[offset];
  let length = der[offset + 1];
  let contentStart = offset + 2;
  if (length & 0x80) {
    const octets = length & 0x7f;
    if (octets === 0 || octets > 4 || contentStart + octets > der.length) {
      throw new ValidationError('Unsupported DER length encoding');
    }
    length = 0;
    for (let i = 0; i < octets; i++) {
      length = length * 256 + der[contentStart + i];
    }
    contentStart += octets;
  }
  const end = contentStart + length;
  if (end > der.length) {
    throw new ValidationError('DER element runs past end of data');
  }
  return { tag, start: offset, contentStart, end };
}

function children(der: Buffer, parent: DerElement): DerElement[] {
  const elements: DerElement[] = [];
  for (let offset = parent.contentStart; offset < parent.end; ) {
    const element = readElement(der, offset);
    elements.push(element);
    offset = element.end;
  }
  return elements;
}

/** The certificate's SubjectPublicKeyInfo exactly as encoded in it */
export function subjectPublicKeyInfo(certificate: Buffer): Buffer {
  const outer = readElement(certificate, 0);
  const [tbs] = children(certificate, outer);
  if (!tbs) {
    throw new ValidationError('Certificate has no TBSCertificate');
  }
  const fields = children(certificate, tbs);
  // An explicit [0] version shifts the remaining fields by one
  const base = fields[0]?.tag === 0xa0 ? 1 : 0;
  const spki = fields[base + 5];
  if (!spki || spki.tag !== 0x30) {
    throw new ValidationError('Certificate SubjectPublicKeyInfo not found');
  }
  return Buffer.from(certificate.subarray(spki.start, spki.end));
}

const signatureAlgorithmNames: Record<string, string> = {
  '1.2.840.113549.1.1.5': 'sha1WithRSAEncryption',
  '1.2.840.113549.1.1.10': 'rsassaPss',
  '1.2.840.113549.1.1.11': 'sha256WithRSAEncryption',
  '1.2.840.113549.1.1.12': 'sha384WithRSAEncryption',
  '1.2.840.113549.1.1.13': 'sha512WithRSAEncryption',
  '1.2.840.10045.4.3.2': 'ecdsa-with-SHA256',
  '1.2.840.10045.4.3.3': 'ecdsa-with-SHA384',
  '1.2.840.10045.4.3.4': 'ecdsa-with-SHA512',
  '1.3.101.112': 'Ed25519',
  '1.3.101.113': 'Ed448',
};

function decodeObjectIdentifier(der: Buffer, element: DerElement): string {
  const arcs: number[] = [];
  let value = 0;
  for (let offset = element.contentStart; offset < element.end; offset++) {
    value = value * 128 + (der[offset] & 0x7f);
    if ((der[offset] & 0x80) === 0) {
      if (arcs.length === 0) {
        const first = value < 40 ? 0 : value < 80 ? 1 : 2;
        arcs.push(first, value - first * 40);
      } else {
        arcs.push(value);
      }
      value = 0;
    }
  }
  return arcs.join('.');
}

/** Name of the algorithm the issuer signed the certificate with, or its OID when unknown */
export function signatureAlgorithm(certificate: Buffer): string {
  const outer = readElement(certificate, 0);
  const algorithm = children(certificate, outer)[1];
  const oid = algorithm ? children(certificate, algorithm)[0] : undefined;
  if (!oid || oid.tag !== 0x06) {
    throw new ValidationError('Certificate signature algorithm not found');
  }
  const dotted = decodeObjectIdentifier(certificate, oid);
  return signatureAlgorithmNames[dotted] ?? dotted;
}

/** `RSA 2048`, `EC prime256v1`, `ED25519` */
function describePublicKey(key: KeyObject): string {
  const type = (key.asymmetricKeyType ?? 'unknown').toUpperCase();
  const details = key.asymmetricKeyDetails;
  if (details?.modulusLength) {
    return `${type} ${details.modulusLength}`;
  }
  if (details?.namedCurve) {
    return `${type} ${details.namedCurve}`;
  }
  return type;
}

export interface CertificateFacts {
  subject: string;
  issuer: string;
  serial_number: string;
  not_before: string;
  not_after: string;
  currently_valid: boolean;
  days_remaining: number;
  signature_algorithm: string;
  public_key_algorithm: string;
  /** Certificates the server presented, leaf included */
  chain_length: number;
  fingerprint_sha256: string;
  fingerprint_sha512: string;
  spki_sha256: string;
  spki_sha512: string;
  subject_alt_names: string[];
}

export function describeCertificate(der: Buffer, now: Date, chainLength = 1): CertificateFacts {
  const certificate = new X509Certificate(der);
  const notBefore = new Date(certificate.validFrom);
  const notAfter = new Date(certificate.validTo);
  const spki = subjectPublicKeyInfo(der);
  return {
    subject: certificate.subject.replace(/\n/g, ', '),
    issuer: certificate.issuer.replace(/\n/g, ', '),
    serial_number: certificate.serialNumber,
    not_before: notBefore.toISOString(),
    not_after: notAfter.toISOString(),
    currently_valid: notBefore.getTime() <= now.getTime() && now.getTime() <= notAfter.getTime(),
    days_remaining: Math.floor((notAfter.getTime() - now.getTime()) / 86_400_000),
    signature_algorithm: signatureAlgorithm(der),
    public_key_algorithm: describePublicKey(certificate.publicKey),
    chain_length: chainLength,
    fingerprint_sha256: certificate.fingerprint256,
    fingerprint_sha512: certificate.fingerprint512,
    spki_sha256: createHash('sha256').update(spki).digest('hex'),
    spki_sha512: createHash('sha512').update(spki).digest('hex'),
    subject_alt_names: certificate.subjectAltName ? certificate.subjectAltName.split(', ') : [],
  };
}

/**
 * True when every certificate from the leaf up to `index` is signed by the
 * next one in the presented chain.
 */
export function chainsTo(certificates: readonly Buffer[], index: number): boolean {
  try {
    for (let i = 0; i < index; i++) {
      const child = new X509Certificate(certificates[i]);
      const issuer = new X509Certificate(certificates[i + 1]);
      if (!child.checkIssued(issuer) || !child.verify(issuer.publicKey)) {
        return false;
      }
    }
    return true;
  } catch (error) {
    logger.debug('Certificate chain check failed', { error: toError(error) });
    return false;
  }
}
