/** Outcome of one chain link, and of a chain as a whole */
export type LinkStatus = 'valid' | 'bogus' | 'insecure' | 'indeterminate';

// Higher is worse
const severity: Record<LinkStatus, number> = {
  valid: 0,
  insecure: 1,
  indeterminate: 2,
  bogus: 3,
};

/**
 * Worst status by bogus > indeterminate > insecure > valid.
 * Nothing to judge is indeterminate.
 */
export function worstStatus(statuses: readonly LinkStatus[]): LinkStatus {
  if (statuses.length === 0) {
    return 'indeterminate';
  }
  return statuses.reduce((worst, status) => (severity[status] > severity[worst] ? status : worst));
}
