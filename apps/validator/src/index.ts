export { dispatchAnalytics } from './analytics.js';
export type { AnalyticsEvent, AnalyticsSink } from './analytics.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { RecordType, recordTypeName } from './dns/constants.js';
export { parseDomain, normalizeName, zoneCutsOf } from './dns/name.js';
export type { Domain } from './dns/name.js';
export { computeKeyTag } from './dns/records.js';
export type { DnsKey, DsRecord, RrsigRecord, TlsaRecord, RRset } from './dns/records.js';
export { UpstreamTransport, parseUpstream } from './dns/transport.js';
export type { DnsTransport, TransportQueryOptions, Upstream } from './dns/transport.js';
export type { DnsMessage, ResourceRecord } from './dns/wire.js';
export { algorithmName, supportedAlgorithmNumbers } from './dnssec/algorithms.js';
export { computeDsDigest, matchDs } from './dnssec/ds-matcher.js';
export { verifyRRset } from './dnssec/signature-verifier.js';
export type { VerificationOutcome } from './dnssec/signature-verifier.js';
export {
  DEFAULT_TRUST_ANCHORS_PATH,
  anchorsFor,
  createTrustAnchorSet,
  loadTrustAnchors,
  matchTrustAnchor,
} from './dnssec/trust-anchors.js';
export type { TrustAnchor, TrustAnchorSet } from './dnssec/trust-anchors.js';
export {
  ConfigError,
  DeadlineExceededError,
  DnssecError,
  InvalidDomainError,
  NetworkError,
  NotFoundError,
  ProtocolError,
  ValidationError,
} from './errors.js';
export { Logger, logger } from './logger.js';
export { initializeMetrics, shutdownMetrics } from './metrics.js';
export { aggregateResult, errorResult, parseResult, serializeResult } from './result.js';
export type { FrozenValidationResult, ResultStatus, ValidationResult } from './result.js';
export { worstStatus } from './status.js';
export type { LinkStatus } from './status.js';
export { TlsCertificateClient } from './tlsa/certificate.js';
export type { CertificateClient, CertificateFacts, PresentedChain } from './tlsa/certificate.js';
export { analyzeDane, assessSecurity } from './tlsa/dane-analysis.js';
export type { DaneAnalysis, RecordAnalysis, SecurityAssessment } from './tlsa/dane-analysis.js';
export type { AssociationResult } from './tlsa/tlsa-matcher.js';
export { tlsaOwnerName } from './tlsa/tlsa-validator.js';
export type { DaneStatus, TlsaFindings, TlsaReport, TlsaSummary } from './tlsa/tlsa-validator.js';
export { DnssecValidator, createValidator } from './validator.js';
export type {
  BulkOptions,
  BulkResult,
  BulkSummary,
  Inspection,
  ValidateOptions,
  ValidatorDependencies,
  ValidatorSettings,
} from './validator.js';
export type { ChainLink, WalkResult } from './zone-walker.js';
