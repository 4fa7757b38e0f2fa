import { z } from 'zod';
import { DEFAULT_TRUST_ANCHORS_PATH } from './dnssec/trust-anchors.js';
import { ConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const upstreamList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  )
  .pipe(z.array(z.string()).min(1, 'At least one upstream resolver is required'));

const headerMap = z
  .string()
  .transform((value, ctx) => {
    try {
      const headers: unknown = JSON.parse(value);
      return headers;
    } catch {
      ctx.addIssue({ code: 'custom', message: 'OTEL_HEADERS must be a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string(), z.string()));

const envSchema = z.object({
  DNS_UPSTREAMS: upstreamList.default(['1.1.1.1', '8.8.8.8']),
  DNS_QUERY_TIMEOUT_MS: z.coerce.number().int().min(100).max(60000).default(3000),
  DNS_QUERY_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  VALIDATION_DEADLINE_MS: z.coerce.number().int().min(1000).max(300000).default(20000),
  TLS_TIMEOUT_MS: z.coerce.number().int().min(100).max(60000).default(10000),
  TRUST_ANCHORS_PATH: z.string().min(1).default(DEFAULT_TRUST_ANCHORS_PATH),
  BULK_MAX_DOMAINS: z.coerce.number().int().min(1).max(1000).default(50),
  BULK_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
  OTEL_ENABLED: booleanFlag.default(false),
  OTEL_EXPORTER: z.enum(['otlp', 'prometheus']).default('otlp'),
  OTEL_ENDPOINT: z.url().default('http://localhost:4318/v1/metrics'),
  OTEL_HEADERS: headerMap.optional(),
  OTEL_PROMETHEUS_PORT: z.coerce.number().int().min(1).max(65535).default(9464),
});

export interface AppConfig {
  readonly upstreams: readonly string[];
  readonly queryTimeoutMs: number;
  readonly queryRetries: number;
  readonly validationDeadlineMs: number;
  readonly tlsTimeoutMs: number;
  readonly trustAnchorsPath: string;
  readonly bulkMaxDomains: number;
  readonly bulkConcurrency: number;
  readonly otel: {
    readonly enabled: boolean;
    readonly exporterType: 'otlp' | 'prometheus';
    readonly endpoint: string;
    readonly headers?: Readonly<Record<string, string>>;
    readonly prometheusPort: number;
  };
}

/**
 * Read configuration from the environment. Empty strings count as unset.
 * Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const input = Object.fromEntries(
    Object.keys(envSchema.shape).flatMap((key): [string, string][] => {
      const value = env[key];
      return value === undefined || value.trim() === '' ? [] : [[key, value]];
    }),
  );

  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return Object.freeze({
    upstreams: Object.freeze(values.DNS_UPSTREAMS),
    queryTimeoutMs: values.DNS_QUERY_TIMEOUT_MS,
    queryRetries: values.DNS_QUERY_RETRIES,
    validationDeadlineMs: values.VALIDATION_DEADLINE_MS,
    tlsTimeoutMs: values.TLS_TIMEOUT_MS,
    trustAnchorsPath: values.TRUST_ANCHORS_PATH,
    bulkMaxDomains: values.BULK_MAX_DOMAINS,
    bulkConcurrency: values.BULK_CONCURRENCY,
    otel: Object.freeze({
      enabled: values.OTEL_ENABLED,
      exporterType: values.OTEL_EXPORTER,
      endpoint: values.OTEL_ENDPOINT,
      headers: values.OTEL_HEADERS,
      prometheusPort: values.OTEL_PROMETHEUS_PORT,
    }),
  });
}
