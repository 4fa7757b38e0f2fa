import { InvalidDomainError } from '../errors.js';

const MAX_NAME_OCTETS = 255;
const MAX_LABEL_OCTETS = 63;
const LABEL_PATTERN = /^(\*|[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?)$/;

/**
 * A fully qualified domain name, lowercased, with its candidate zone cuts
 * listed from the root down to the name itself.
 */
export interface Domain {
  readonly name: string;
  readonly labels: readonly string[];
  readonly zoneCuts: readonly string[];
}

/** Lowercase and add the trailing dot. The root is "." */
export function normalizeName(name: string): string {
  const lower = name.trim().toLowerCase();
  if (lower === '' || lower === '.') {
    return '.';
  }
  return lower.endsWith('.') ? lower : `${lower}.`;
}

export function splitLabels(name: string): string[] {
  const normalized = normalizeName(name);
  return normalized === '.' ? [] : normalized.slice(0, -1).split('.');
}

export function parseDomain(input: string): Domain {
  if (typeof input !== 'string' || input.trim() === '') {
    throw new InvalidDomainError('Domain name is empty');
  }
  const name = normalizeName(input);
  const labels = splitLabels(name);

  for (const label of labels) {
    if (label.length === 0) {
      throw new InvalidDomainError(`Empty label in ${input}`);
    }
    if (Buffer.byteLength(label) > MAX_LABEL_OCTETS) {
      throw new InvalidDomainError(`Label "${label}" exceeds ${MAX_LABEL_OCTETS} octets`);
    }
    if (!LABEL_PATTERN.test(label)) {
      throw new InvalidDomainError(`Label "${label}" contains invalid characters`);
    }
  }
  if (encodeName(name).length > MAX_NAME_OCTETS) {
    throw new InvalidDomainError(`Domain name exceeds ${MAX_NAME_OCTETS} octets`);
  }

  return Object.freeze({
    name,
    labels: Object.freeze(labels),
    zoneCuts: Object.freeze(zoneCutsOf(name)),
  });
}

/** Every ancestor of `name` plus the name itself, root first */
export function zoneCutsOf(name: string): string[] {
  const labels = splitLabels(name);
  const cuts = ['.'];
  for (let i = labels.length - 1; i >= 0; i--) {
    cuts.push(`${labels.slice(i).join('.')}.`);
  }
  return cuts;
}

export function parentOf(name: string): string | null {
  const labels = splitLabels(name);
  if (labels.length === 0) {
    return null;
  }
  return labels.length === 1 ? '.' : `${labels.slice(1).join('.')}.`;
}

/** True when `name` equals `ancestor` or sits below it */
export function isSubdomainOf(name: string, ancestor: string): boolean {
  const child = normalizeName(name);
  const parent = normalizeName(ancestor);
  if (parent === '.') {
    return true;
  }
  return child === parent || child.endsWith(`.${parent}`);
}

/** Label count as RRSIG uses it: root is 0 and a leading "*" is not counted */
export function countLabels(name: string): number {
  const labels = splitLabels(name);
  return labels[0] === '*' ? labels.length - 1 : labels.length;
}

/** Uncompressed, lowercased wire form */
export function encodeName(name: string): Buffer {
  const parts: Buffer[] = [];
  for (const label of splitLabels(name)) {
    const bytes = Buffer.from(label, 'utf8');
    parts.push(Buffer.from([bytes.length]), bytes);
  }
  parts.push(Buffer.from([0]));
  return Buffer.concat(parts);
}
