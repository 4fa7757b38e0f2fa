import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  MeterProvider,
  MetricReader,
  PeriodicExportingMetricReader,
  type ResourceMetrics,
} from '@opentelemetry/sdk-metrics';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import type { AppConfig } from './config.js';
import { toError } from './errors.js';
import { logger } from './logger.js';

const SERVICE_NAME = 'dnssec-validator';
const SERVICE_VERSION = '1.0.0';
const EXPORT_INTERVAL_MS = 10_000;

type OtelConfig = AppConfig['otel'];

type ExportResult = {
  code: number;
  error?: Error;
};

interface Instruments {
  validations: Counter;
  validationDuration: Histogram;
  upstreamQueries: Counter;
  upstreamErrors: Counter;
  upstreamResponseTime: Histogram;
}

let meterProvider: MeterProvider | null = null;
let instruments: Instruments | null = null;

function maskHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    masked[key] = key.toLowerCase() === 'authorization' ? `${value.substring(0, 10)}... (length: ${value.length})` : value;
  }
  return masked;
}

/**
 * OTLP exporter that logs each export's outcome
 */
class LoggingOTLPMetricExporter extends OTLPMetricExporter {
  private exportCount = 0;
  private failureCount = 0;

  constructor(private readonly config: { url: string; headers?: Record<string, string> }) {
    super(config);
    logger.debug('OTLP metric exporter initialized', {
      endpoint: config.url,
      headers: maskHeaders(config.headers ?? {}),
    });
  }

  override export(metrics: ResourceMetrics, resultCallback: (result: ExportResult) => void): void {
    this.exportCount++;
    const startTime = Date.now();
    super.export(metrics, (result: ExportResult) => {
      const duration = Date.now() - startTime;
      if (result.code === 0) {
        logger.debug('OpenTelemetry metrics export succeeded', {
          exportCount: this.exportCount,
          duration: `${duration}ms`,
          endpoint: this.config.url,
        });
      } else {
        this.failureCount++;
        logger.error('OpenTelemetry metrics export failed', {
          exportCount: this.exportCount,
          failureCount: this.failureCount,
          duration: `${duration}ms`,
          endpoint: this.config.url,
          error: result.error ?? new Error('Unknown export error'),
        });
      }
      resultCallback(result);
    });
  }
}

function exporterReader(config: OtelConfig): MetricReader {
  if (config.exporterType === 'prometheus') {
    const port = config.prometheusPort;
    return new PrometheusExporter({ port, endpoint: '/metrics' }, () => {
      logger.info(`Prometheus metrics endpoint started on port ${port}`);
    });
  }

  const headers: Record<string, string> = { ...(config.headers ?? {}) };
  const auth = headers.Authorization ?? headers.authorization;
  if (auth) {
    delete headers.authorization;
    headers.Authorization = /^bearer /i.test(auth) ? auth : `Bearer ${auth}`;
  }
  return new PeriodicExportingMetricReader({
    exporter: new LoggingOTLPMetricExporter({ url: config.endpoint, headers }),
    exportIntervalMillis: EXPORT_INTERVAL_MS,
  });
}

function createInstruments(meter: Meter): Instruments {
  return {
    validations: meter.createCounter('dnssec.validations', {
      description: 'Completed validations by overall status',
    }),
    validationDuration: meter.createHistogram('dnssec.validation.duration', {
      description: 'Validation duration in milliseconds',
      unit: 'ms',
    }),
    upstreamQueries: meter.createCounter('dnssec.upstream.queries', {
      description: 'Queries sent to upstream resolvers',
    }),
    upstreamErrors: meter.createCounter('dnssec.upstream.errors', {
      description: 'Upstream queries that failed',
    }),
    upstreamResponseTime: meter.createHistogram('dnssec.upstream.response_time', {
      description: 'Upstream response time in milliseconds',
      unit: 'ms',
    }),
  };
}

/**
 * Start metrics collection. `extraReaders` are attached alongside the
 * configured exporter; with neither, metrics stay off and recording is a no-op.
 */
export async function initializeMetrics(config: OtelConfig, extraReaders: MetricReader[] = []): Promise<void> {
  await shutdownMetrics();

  const readers = [...extraReaders];
  if (config.enabled) {
    try {
      readers.push(exporterReader(config));
    } catch (error) {
      logger.error('Failed to create OpenTelemetry exporter', { error: toError(error) });
    }
  }
  if (readers.length === 0) {
    logger.info('OpenTelemetry metrics disabled');
    return;
  }

  meterProvider = new MeterProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    }),
    readers,
  });
  instruments = createInstruments(meterProvider.getMeter(SERVICE_NAME, SERVICE_VERSION));

  logger.info('OpenTelemetry metrics initialized', {
    exporterType: config.enabled ? config.exporterType : 'none',
    endpoint: config.exporterType === 'otlp' ? config.endpoint : `http://localhost:${config.prometheusPort}/metrics`,
  });
}

export async function shutdownMetrics(): Promise<void> {
  const provider = meterProvider;
  meterProvider = null;
  instruments = null;
  if (!provider) {
    return;
  }
  try {
    await provider.shutdown();
  } catch (error) {
    logger.error('Error shutting down OpenTelemetry metrics', { error: toError(error) });
  }
}

export function recordValidation(attributes: { status: string; tlsa: boolean; durationMs: number }): void {
  if (!instruments) {
    return;
  }
  try {
    const labels = { 'dnssec.status': attributes.status, 'dnssec.tlsa': attributes.tlsa };
    instruments.validations.add(1, labels);
    instruments.validationDuration.record(attributes.durationMs, labels);
  } catch (error) {
    logger.error('Error recording validation metrics', { error: toError(error), attributes });
  }
}

export function recordUpstreamQuery(attributes: {
  upstream: string;
  recordType: string;
  success: boolean;
  responseTime: number;
}): void {
  if (!instruments) {
    return;
  }
  try {
    const labels = { 'dns.upstream.server': attributes.upstream, 'dns.query.type': attributes.recordType };
    instruments.upstreamQueries.add(1, labels);
    if (!attributes.success) {
      instruments.upstreamErrors.add(1, labels);
    }
    instruments.upstreamResponseTime.record(attributes.responseTime, labels);
  } catch (error) {
    logger.error('Error recording upstream metrics', { error: toError(error), attributes });
  }
}
