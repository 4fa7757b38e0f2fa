import { toError } from './errors.js';
import { logger } from './logger.js';
import type { ResultStatus } from './result.js';

export interface AnalyticsEvent {
  domain: string;
  status: ResultStatus;
  /** Who asked, e.g. `api`, `cli`, `bulk` */
  source: string;
  timestamp: Date;
}

export interface AnalyticsSink {
  record(event: AnalyticsEvent): void | Promise<void>;
}

/**
 * Hand an event to the sink without waiting for it. Failures are logged and
 * never reach the caller.
 */
export function dispatchAnalytics(sink: AnalyticsSink | undefined, event: AnalyticsEvent): void {
  if (!sink) {
    return;
  }
  const report = (error: unknown) =>
    logger.warn('Analytics sink failed', { domain: event.domain, source: event.source, error: toError(error) });
  try {
    Promise.resolve(sink.record(event)).catch(report);
  } catch (error) {
    report(error);
  }
}
