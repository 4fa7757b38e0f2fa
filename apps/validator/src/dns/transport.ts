import dgram from 'dgram';
import net from 'net';
import tls from 'tls';
import { NetworkError, ProtocolError, toError } from '../errors.js';
import { logger } from '../logger.js';
import { recordUpstreamQuery } from '../metrics.js';
import { recordTypeName } from './constants.js';
import { normalizeName } from './name.js';
import { buildQuery, decodeMessage, encodeMessage, type DnsMessage } from './wire.js';

export interface TransportQueryOptions {
  timeoutMs: number;
}

/**
 * Sends one DNSSEC-OK query and returns the decoded response.
 * Rejects with NetworkError when no answer arrives and ProtocolError when
 * the answer cannot be used.
 */
export interface DnsTransport {
  query(name: string, type: number, options: TransportQueryOptions): Promise<DnsMessage>;
}

export type UpstreamProtocol = 'udp' | 'tcp' | 'https' | 'tls';

export interface Upstream {
  protocol: UpstreamProtocol;
  host: string;
  port: number;
  /** Full endpoint for DNS-over-HTTPS */
  url?: string;
  label: string;
}

const DEFAULT_PORTS: Record<UpstreamProtocol, number> = { udp: 53, tcp: 53, https: 443, tls: 853 };

function splitHostPort(value: string, defaultPort: number): { host: string; port: number } {
  const bracketed = value.match(/^\[([^\]]+)\](?::(\d+))?$/);
  if (bracketed) {
    return { host: bracketed[1], port: bracketed[2] ? parseInt(bracketed[2], 10) : defaultPort };
  }
  // A bare IPv6 address has more than one colon and no port
  const parts = value.split(':');
  if (parts.length === 2 && /^\d+$/.test(parts[1])) {
    return { host: parts[0], port: parseInt(parts[1], 10) };
  }
  return { host: value, port: defaultPort };
}

/**
 * Parse an upstream entry: `1.1.1.1`, `1.1.1.1:5353`, `[2606:4700::1111]:53`,
 * `tcp://9.9.9.9`, `tls://1.1.1.1`, or an `https://` DoH endpoint.
 */
export function parseUpstream(entry: string): Upstream {
  const value = entry.trim();
  if (value.startsWith('https://')) {
    let url = value;
    // Default DoH path when none is given
    if (!/^https:\/\/[^/]+\/.+/.test(url)) {
      url = url.endsWith('/') ? `${url}dns-query` : `${url}/dns-query`;
    }
    const parsed = new URL(url);
    return {
      protocol: 'https',
      host: parsed.hostname,
      port: parsed.port ? parseInt(parsed.port, 10) : DEFAULT_PORTS.https,
      url,
      label: value,
    };
  }

  const scheme = value.match(/^(tls|dot|tcp|udp):\/\/(.+)$/);
  let protocol: UpstreamProtocol = 'udp';
  if (scheme?.[1] === 'tls' || scheme?.[1] === 'dot') {
    protocol = 'tls';
  } else if (scheme?.[1] === 'tcp') {
    protocol = 'tcp';
  }
  const { host, port } = splitHostPort(scheme ? scheme[2] : value, DEFAULT_PORTS[protocol]);
  if (host.length === 0 || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ProtocolError('malformed', `Invalid upstream resolver "${entry}"`);
  }
  return { protocol, host, port, label: value };
}

function frame(message: Buffer): Buffer {
  const prefix = Buffer.alloc(2);
  prefix.writeUInt16BE(message.length, 0);
  return Buffer.concat([prefix, message]);
}

function timeoutError(upstream: Upstream, timeoutMs: number): NetworkError {
  return new NetworkError('timeout', `DNS query to ${upstream.label} timed out after ${timeoutMs}ms`);
}

function unreachableError(upstream: Upstream, error: unknown): NetworkError {
  return new NetworkError('unreachable', `DNS upstream ${upstream.label} unreachable: ${toError(error).message}`, {
    cause: error,
  });
}

function sendUdp(upstream: Upstream, query: Buffer, id: number, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const client = dgram.createSocket(net.isIPv6(upstream.host) ? 'udp6' : 'udp4');
    let settled = false;

    const finish = (outcome: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      client.close();
      outcome();
    };

    const timer = setTimeout(() => finish(() => reject(timeoutError(upstream, timeoutMs))), timeoutMs);

    client.on('message', (response: Buffer) => {
      // Ignore stray datagrams that are not answers to this query
      if (response.length >= 2 && response.readUInt16BE(0) === id) {
        finish(() => resolve(response));
      }
    });

    client.on('error', (error) => finish(() => reject(unreachableError(upstream, error))));

    client.send(query, upstream.port, upstream.host, (error) => {
      if (error) {
        finish(() => reject(unreachableError(upstream, error)));
      }
    });
  });
}

/** Length-prefixed exchange over TCP or TLS (RFC 1035 4.2.2, RFC 7858) */
function sendStream(upstream: Upstream, query: Buffer, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const socket: net.Socket =
      upstream.protocol === 'tls'
        ? tls.connect({
            host: upstream.host,
            port: upstream.port,
            // SNI only takes host names
            servername: net.isIP(upstream.host) ? undefined : upstream.host,
          })
        : net.createConnection({ host: upstream.host, port: upstream.port });
    let settled = false;
    let responseBuffer = Buffer.alloc(0);

    const finish = (outcome: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      outcome();
    };

    const timer = setTimeout(() => finish(() => reject(timeoutError(upstream, timeoutMs))), timeoutMs);

    socket.on(upstream.protocol === 'tls' ? 'secureConnect' : 'connect', () => {
      socket.write(frame(query));
    });

    socket.on('data', (data: Buffer) => {
      responseBuffer = Buffer.concat([responseBuffer, data]);
      if (responseBuffer.length >= 2) {
        const length = responseBuffer.readUInt16BE(0);
        if (responseBuffer.length >= length + 2) {
          const response = Buffer.from(responseBuffer.subarray(2, length + 2));
          finish(() => resolve(response));
        }
      }
    });

    socket.on('error', (error) => finish(() => reject(unreachableError(upstream, error))));

    socket.on('close', () =>
      finish(() => reject(new NetworkError('unreachable', `${upstream.label} closed the connection before answering`))),
    );
  });
}

/** DNS-over-HTTPS, RFC 8484 POST with the wire-format body */
async function sendHttps(upstream: Upstream, query: Buffer, timeoutMs: number): Promise<Buffer> {
  const url = upstream.url ?? `https://${upstream.host}/dns-query`;
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/dns-message',
        Accept: 'application/dns-message',
      },
      body: query,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw timeoutError(upstream, timeoutMs);
    }
    throw unreachableError(upstream, error);
  }

  if (!response.ok) {
    throw new ProtocolError(
      'refused',
      `DoH request to ${upstream.label} failed: ${response.status} ${response.statusText}`,
    );
  }
  const contentType = response.headers.get('content-type') || '';
  if (!contentType.includes('application/dns-message')) {
    throw new ProtocolError('malformed', `Unsupported DoH content type: ${contentType}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

function checkResponse(response: DnsMessage, query: DnsMessage): DnsMessage {
  if (response.id !== query.id || !response.flags.qr) {
    throw new ProtocolError('malformed', 'Response does not answer the query');
  }
  const question = query.questions[0];
  const echoed = response.questions[0];
  if (echoed && (normalizeName(echoed.name) !== question.name || echoed.type !== question.type)) {
    throw new ProtocolError('malformed', `Response question ${echoed.name} does not match ${question.name}`);
  }
  return response;
}

/**
 * Transport over a list of upstream resolvers with failover: each upstream is
 * tried in order until one answers. Every query opens and closes its own socket.
 */
export class UpstreamTransport implements DnsTransport {
  private readonly upstreams: readonly Upstream[];

  constructor(upstreams: readonly string[]) {
    if (upstreams.length === 0) {
      throw new ProtocolError('malformed', 'At least one upstream resolver is required');
    }
    this.upstreams = upstreams.map(parseUpstream);
  }

  getUpstreams(): readonly Upstream[] {
    return this.upstreams;
  }

  /**
   * The whole call, failover and TCP retries included, finishes within
   * `timeoutMs`. Each upstream gets an even share of what is left.
   */
  async query(name: string, type: number, options: TransportQueryOptions): Promise<DnsMessage> {
    const cutoff = Date.now() + options.timeoutMs;
    const errors: Error[] = [];

    for (const [index, upstream] of this.upstreams.entries()) {
      const remaining = cutoff - Date.now();
      if (remaining <= 0) {
        break;
      }
      const attemptCutoff = Date.now() + Math.max(1, Math.floor(remaining / (this.upstreams.length - index)));
      const startTime = Date.now();
      try {
        const response = await this.exchange(upstream, name, type, attemptCutoff);
        recordUpstreamQuery({
          upstream: upstream.label,
          recordType: recordTypeName(type),
          success: true,
          responseTime: Date.now() - startTime,
        });
        return response;
      } catch (error) {
        const err = toError(error);
        recordUpstreamQuery({
          upstream: upstream.label,
          recordType: recordTypeName(type),
          success: false,
          responseTime: Date.now() - startTime,
        });
        logger.debug('Upstream query failed', {
          upstream: upstream.label,
          name,
          type: recordTypeName(type),
          error: err,
        });
        errors.push(err);
      }
    }

    // Report the most telling failure: a usable protocol answer beats a timeout
    const protocolError = errors.find((error) => error instanceof ProtocolError);
    if (protocolError) {
      throw protocolError;
    }
    const timedOut =
      errors.length < this.upstreams.length ||
      errors.some((error) => error instanceof NetworkError && error.kind === 'timeout');
    if (timedOut) {
      throw new NetworkError(
        'timeout',
        `DNS query for ${normalizeName(name)} ${recordTypeName(type)} timed out after ${options.timeoutMs}ms`,
        errors.length > 0 ? { cause: errors[errors.length - 1] } : undefined,
      );
    }
    throw new NetworkError(
      'unreachable',
      `All upstream DNS servers failed: ${errors.map((error) => error.message).join(', ')}`,
    );
  }

  private async exchange(upstream: Upstream, name: string, type: number, cutoff: number): Promise<DnsMessage> {
    const query = buildQuery(name, type);
    const wire = encodeMessage(query);
    const timeoutMs = cutoff - Date.now();

    if (upstream.protocol === 'https') {
      return checkResponse(decodeMessage(await sendHttps(upstream, wire, timeoutMs)), query);
    }
    if (upstream.protocol === 'tls' || upstream.protocol === 'tcp') {
      return checkResponse(decodeMessage(await sendStream(upstream, wire, timeoutMs)), query);
    }

    const response = checkResponse(decodeMessage(await sendUdp(upstream, wire, query.id, timeoutMs)), query);
    if (!response.flags.tc) {
      return response;
    }
    // Truncated over UDP: ask again over TCP with what is left of this attempt
    const tcpTimeoutMs = cutoff - Date.now();
    if (tcpTimeoutMs <= 0) {
      throw timeoutError(upstream, timeoutMs);
    }
    return checkResponse(
      decodeMessage(await sendStream({ ...upstream, protocol: 'tcp' }, wire, tcpTimeoutMs)),
      query,
    );
  }
}
