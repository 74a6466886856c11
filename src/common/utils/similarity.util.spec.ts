import {
  matchingCharacters,
  similarityRatio,
  titleSimilarity,
} from './similarity.util';

describe('similarity util', () => {
  it('counts characters in matching blocks on both sides of the longest one', () => {
    expect(matchingCharacters('abcd', 'bcde')).toBe(3);
    expect(matchingCharacters('xabyzcd', 'abqcd')).toBe(4);
    expect(matchingCharacters('abc', 'xyz')).toBe(0);
  });

  it('scales matches by the combined length', () => {
    expect(similarityRatio('abcd', 'bcde')).toBe(0.75);
    expect(similarityRatio('', '')).toBe(1);
    expect(similarityRatio('abc', '')).toBe(0);
  });

  it('compares titles without case', () => {
    expect(
      titleSimilarity('Kubernetes 1.30 Released', 'kubernetes 1.30 released!'),
    ).toBeCloseTo(48 / 49);
    expect(
      titleSimilarity('Rust in the kernel', 'Gardening tips'),
    ).toBeLessThan(0.5);
  });
});
