import { EditionStatus, Newsletter } from '../../database/schema';

const TRANSITIONS: Record<EditionStatus, readonly EditionStatus[]> = {
  draft: ['scheduled', 'sending'],
  scheduled: ['sending', 'failed'],
  sending: ['sent', 'failed'],
  sent: [],
  failed: [],
};

export function canTransition(from: EditionStatus, to: EditionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: EditionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function isNewsletterActive(
  newsletter: Pick<Newsletter, 'status'>,
): boolean {
  return newsletter.status === 'active';
}
