import {
  cleanText,
  containsAny,
  estimateReadTimeMinutes,
  extractiveSummary,
  truncateWords,
} from './text.util';

describe('text util', () => {
  it('cleans cdata, tags and entities', () => {
    expect(cleanText('<![CDATA[<p>Rust &amp; Go&#33;</p>]]>')).toBe(
      'Rust & Go!',
    );
  });

  it('builds an extractive summary from leading sentences', () => {
    const text =
      'First sentence here. Second sentence follows. ' + 'x'.repeat(400) + '.';

    expect(extractiveSummary(text, 60)).toBe(
      'First sentence here. Second sentence follows.',
    );
  });

  it('cuts an oversized first sentence on a word boundary', () => {
    expect(extractiveSummary('alpha beta gamma delta epsilon', 16)).toBe(
      'alpha beta...',
    );
  });

  it('truncates on the last full word', () => {
    expect(truncateWords('The quick brown fox jumps', 12)).toBe('The quick...');
    expect(truncateWords('short', 12)).toBe('short');
  });

  it('estimates read time in whole minutes', () => {
    expect(estimateReadTimeMinutes('')).toBe(1);
    expect(estimateReadTimeMinutes(Array(441).fill('word').join(' '))).toBe(3);
  });

  it('matches keywords case-insensitively', () => {
    expect(containsAny('Kubernetes Release Notes', ['kubernetes'])).toBe(true);
    expect(containsAny('Kubernetes Release Notes', ['docker', ''])).toBe(false);
  });
});
