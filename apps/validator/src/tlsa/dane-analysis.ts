import { TlsaMatchingType, TlsaUsage, matchingTypeName, selectorName, usageName } from './tlsa-matcher.js';
import type { DaneStatus, TlsaFindings, TlsaRecordView } from './tlsa-validator.js';

export interface UsageAnalysis {
  type: number;
  name: string;
  description: string;
  security_implications: string;
  recommended: boolean;
}

export interface SelectorAnalysis {
  type: number;
  name: string;
  description: string;
  advantages: string[];
  disadvantages: string[];
}

export interface MatchingAnalysis {
  type: number;
  name: string;
  description: string;
  hash_algorithm?: string;
  security_strength: 'high' | 'very_high' | 'unknown';
}

export interface RecordAnalysis {
  record: TlsaRecordView;
  usage: UsageAnalysis;
  selector: SelectorAnalysis;
  matching: MatchingAnalysis;
  security_notes: string[];
}

export interface SecurityAssessment {
  /** 0 to 100 */
  overall_score: number;
  strengths: string[];
  weaknesses: string[];
  risk_factors: string[];
}

export interface DaneAnalysis {
  record_analysis: RecordAnalysis[];
  security_assessment: SecurityAssessment;
  troubleshooting: string[];
  recommendations: string[];
}

const usageDetails: Record<number, Omit<UsageAnalysis, 'type' | 'name'>> = {
  [TlsaUsage.PKIX_TA]: {
    description: 'CA constraint: the chain must validate through PKIX and include the named CA',
    security_implications: 'Adds a pin on top of ordinary CA validation',
    recommended: true,
  },
  [TlsaUsage.PKIX_EE]: {
    description: 'Service certificate constraint: the leaf must validate through PKIX and match',
    security_implications: 'Pins the certificate while keeping CA validation',
    recommended: true,
  },
  [TlsaUsage.DANE_TA]: {
    description: 'Trust anchor assertion: the chain must lead to the named trust anchor',
    security_implications: 'Replaces the public CAs with a DNS-published trust anchor',
    recommended: false,
  },
  [TlsaUsage.DANE_EE]: {
    description: 'Domain-issued certificate: the leaf must match exactly',
    security_implications: 'Bypasses the CA system; DNSSEC is the only source of trust',
    recommended: true,
  },
};

export function analyzeUsage(usage: number): UsageAnalysis {
  const details = usageDetails[usage] ?? {
    description: 'Unknown certificate usage',
    security_implications: 'Validators may not support this usage',
    recommended: false,
  };
  return { type: usage, name: usageName(usage), ...details };
}

export function analyzeSelector(selector: number): SelectorAnalysis {
  const analysis: SelectorAnalysis = {
    type: selector,
    name: selectorName(selector),
    description: 'Unknown selector',
    advantages: [],
    disadvantages: [],
  };
  if (selector === 0) {
    analysis.description = 'Matches the complete certificate';
    analysis.advantages = ['Precise matching', 'No ambiguity about which certificate'];
    analysis.disadvantages = ['Larger DNS records', 'DNS must change whenever the certificate does'];
  } else if (selector === 1) {
    analysis.description = 'Matches the SubjectPublicKeyInfo';
    analysis.advantages = ['Smaller DNS records', 'Survives renewal with the same key'];
    analysis.disadvantages = ['Less precise than full certificate matching'];
  }
  return analysis;
}

export function analyzeMatchingType(matchingType: number): MatchingAnalysis {
  const name = matchingTypeName(matchingType);
  switch (matchingType) {
    case TlsaMatchingType.FULL:
      return { type: matchingType, name, description: 'Full data, no hashing', security_strength: 'high' };
    case TlsaMatchingType.SHA256:
      return {
        type: matchingType,
        name,
        description: 'SHA-256 hash of the selected data',
        hash_algorithm: 'SHA-256',
        security_strength: 'high',
      };
    case TlsaMatchingType.SHA512:
      return {
        type: matchingType,
        name,
        description: 'SHA-512 hash of the selected data',
        hash_algorithm: 'SHA-512',
        security_strength: 'very_high',
      };
    default:
      return { type: matchingType, name, description: 'Unknown matching type', security_strength: 'unknown' };
  }
}

function isHashed(record: TlsaRecordView): boolean {
  return record.matching_type === TlsaMatchingType.SHA256 || record.matching_type === TlsaMatchingType.SHA512;
}

function analyzeRecord(record: TlsaRecordView): RecordAnalysis {
  const notes: string[] = [];
  if (record.usage === TlsaUsage.PKIX_TA || record.usage === TlsaUsage.PKIX_EE) {
    notes.push('PKIX usage: the chain must also validate against a public CA');
  } else if (record.usage === TlsaUsage.DANE_TA || record.usage === TlsaUsage.DANE_EE) {
    notes.push('DANE usage: CA validation is not required');
  }
  if (record.matching_type === TlsaMatchingType.FULL) {
    notes.push('Full data matching: larger records, exact comparison');
  } else if (isHashed(record)) {
    notes.push('Hash matching: compact records');
  }
  return {
    record,
    usage: analyzeUsage(record.usage),
    selector: analyzeSelector(record.selector),
    matching: analyzeMatchingType(record.matching_type),
    security_notes: notes,
  };
}

const statusWeaknesses: Record<DaneStatus, string | undefined> = {
  valid: undefined,
  invalid: 'TLSA records do not match the server certificate',
  'no-tlsa': 'No TLSA records found; DANE is not deployed',
  'dnssec-required': 'TLSA records are not protected by a validated DNSSEC chain',
  'cert-unavailable': 'Server certificate could not be retrieved',
  indeterminate: 'TLSA validation could not complete',
};

/**
 * Score a DANE deployment. Points: 40 for a matching TLSA set, 10 per hashed
 * record (5 for full data), 15 per DANE-EE record, 20 for a certificate in its
 * validity period and 5 more when it has over 30 days left. Clamped to 0-100.
 */
export function assessSecurity(findings: TlsaFindings): SecurityAssessment {
  const assessment: SecurityAssessment = { overall_score: 0, strengths: [], weaknesses: [], risk_factors: [] };
  let score = 0;

  const weakness = statusWeaknesses[findings.summary.dane_status];
  if (weakness) {
    assessment.weaknesses.push(weakness);
  } else {
    score += 40;
    assessment.strengths.push('TLSA records validate successfully');
  }

  for (const record of findings.records) {
    if (isHashed(record)) {
      score += 10;
      assessment.strengths.push(`Uses strong hashing: ${record.matching_type_name}`);
    } else if (record.matching_type === TlsaMatchingType.FULL) {
      score += 5;
      assessment.strengths.push('Uses full data matching');
    }
  }

  for (const record of findings.records) {
    if (record.usage === TlsaUsage.DANE_EE) {
      score += 15;
      assessment.strengths.push('Uses DANE-EE, pinning the service certificate without a CA');
    }
  }

  const certificate = findings.certificate;
  if (certificate) {
    if (certificate.currently_valid) {
      score += 20;
      assessment.strengths.push('Certificate is currently valid');
      if (certificate.days_remaining > 30) {
        score += 5;
      } else {
        assessment.risk_factors.push(`Certificate expires in ${certificate.days_remaining} days`);
      }
    } else if (certificate.days_remaining < 0) {
      assessment.weaknesses.push('Certificate has expired');
    } else {
      assessment.weaknesses.push('Certificate is not yet valid');
    }
  }

  assessment.overall_score = Math.min(100, Math.max(0, score));
  return assessment;
}

export function troubleshoot(findings: TlsaFindings): string[] {
  const steps: string[] = [];
  switch (findings.summary.dane_status) {
    case 'no-tlsa':
      steps.push(
        'No TLSA records found',
        `Publish a TLSA record at ${findings.name} generated from the server certificate`,
        'Check that resolvers see the new record and that the zone signs it',
      );
      break;
    case 'cert-unavailable':
      steps.push(
        'The server certificate could not be retrieved',
        `Check that a TLS service answers on port ${findings.port}`,
        'Check firewalls between the validator and the server',
      );
      break;
    case 'invalid':
      steps.push(
        'TLSA records do not match the server certificate',
        'The certificate may have been renewed without updating the TLSA records',
        'Regenerate the association data and compare usage, selector and matching type',
      );
      break;
    case 'dnssec-required':
      steps.push(
        'TLSA records are only trustworthy when DNSSEC validates them',
        `Fix the chain of trust first: ${findings.summary.message}`,
      );
      break;
    case 'indeterminate':
      steps.push('TLSA validation could not complete', findings.summary.message);
      break;
    case 'valid':
      break;
  }

  for (const association of findings.associations) {
    if (!association.matched) {
      steps.push(
        `TLSA ${association.usage} ${association.selector} ${association.matching_type}: ${association.reason}`,
      );
    }
  }
  return steps;
}

export function recommend(findings: TlsaFindings): string[] {
  const recommendations: string[] = [];
  if (findings.summary.dane_status === 'valid') {
    recommendations.push('DANE validation succeeded');
  }

  if (findings.records.some((record) => record.usage === TlsaUsage.DANE_EE)) {
    recommendations.push('DANE-EE (usage 3) is in use');
  } else {
    recommendations.push('Consider DANE-EE (usage 3) records');
  }

  if (findings.records.some(isHashed)) {
    recommendations.push('SHA-256 or SHA-512 matching is in use');
  } else {
    recommendations.push('Use SHA-256 or SHA-512 matching');
  }

  if (findings.certificate && findings.certificate.days_remaining < 30) {
    recommendations.push('Plan certificate renewal together with a TLSA update');
  }

  recommendations.push(
    'Automate TLSA updates as part of certificate renewal',
    'Monitor DANE validation regularly',
  );
  return recommendations;
}

export function analyzeDane(findings: TlsaFindings): DaneAnalysis {
  return {
    record_analysis: findings.records.map(analyzeRecord),
    security_assessment: assessSecurity(findings),
    troubleshooting: troubleshoot(findings),
    recommendations: recommend(findings),
  };
}
