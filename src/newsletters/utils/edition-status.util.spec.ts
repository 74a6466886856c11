import {
  canTransition,
  isNewsletterActive,
  isTerminal,
} from './edition-status.util';

describe('edition status util', () => {
  it('allows only forward transitions', () => {
    expect(canTransition('draft', 'scheduled')).toBe(true);
    expect(canTransition('draft', 'sending')).toBe(true);
    expect(canTransition('scheduled', 'failed')).toBe(true);
    expect(canTransition('sending', 'sent')).toBe(true);

    expect(canTransition('sent', 'draft')).toBe(false);
    expect(canTransition('sending', 'scheduled')).toBe(false);
    expect(canTransition('failed', 'sending')).toBe(false);
    expect(canTransition('draft', 'sent')).toBe(false);
  });

  it('treats sent and failed as terminal', () => {
    expect(isTerminal('sent')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('scheduled')).toBe(false);
  });

  it('classifies newsletter activity by status', () => {
    expect(isNewsletterActive({ status: 'active' })).toBe(true);
    expect(isNewsletterActive({ status: 'paused' })).toBe(false);
  });
});
