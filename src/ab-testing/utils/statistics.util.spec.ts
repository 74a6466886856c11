import {
  chiSquaredCdf,
  chiSquaredSignificance,
  erf,
  logGamma,
  normalCdf,
  stableHash,
  twoProportionSignificance,
} from './statistics.util';

describe('statistics', () => {
  it('approximates the error function and the normal CDF', () => {
    expect(erf(0)).toBeCloseTo(0, 6);
    expect(erf(1)).toBeCloseTo(0.8427, 4);
    expect(erf(-1)).toBeCloseTo(-0.8427, 4);
    expect(normalCdf(0)).toBeCloseTo(0.5, 6);
    expect(normalCdf(1.96)).toBeCloseTo(0.975, 3);
  });

  it('computes log-gamma for integers and halves', () => {
    expect(logGamma(5)).toBeCloseTo(Math.log(24), 10);
    expect(logGamma(0.5)).toBeCloseTo(Math.log(Math.sqrt(Math.PI)), 10);
  });

  it('matches known chi-squared quantiles', () => {
    expect(chiSquaredCdf(0, 3)).toBe(0);
    expect(chiSquaredCdf(3.841, 1)).toBeCloseTo(0.95, 3);
    expect(chiSquaredCdf(5.991, 2)).toBeCloseTo(0.95, 3);
    expect(chiSquaredCdf(7.815, 3)).toBeCloseTo(0.95, 3);
    expect(chiSquaredCdf(30, 2)).toBeCloseTo(1, 6);
  });

  it('scores two-proportion differences', () => {
    expect(twoProportionSignificance([200, 260], [1000, 1000])).toBeGreaterThan(
      0.99,
    );
    expect(twoProportionSignificance([200, 200], [1000, 1000])).toBeCloseTo(
      0,
      6,
    );
    expect(twoProportionSignificance([0, 0], [100, 100])).toBe(0);
    expect(twoProportionSignificance([5, 5], [0, 100])).toBe(0);
  });

  it('scores multi-group differences', () => {
    expect(chiSquaredSignificance([100, 100, 100], [500, 500, 500])).toBe(0);
    expect(
      chiSquaredSignificance([100, 150, 200], [500, 500, 500]),
    ).toBeGreaterThan(0.99);
    expect(chiSquaredSignificance([0, 0, 0], [500, 500, 500])).toBe(0);
  });

  it('hashes strings stably', () => {
    expect(stableHash('')).toBe(0x811c9dc5);
    expect(stableHash('42')).toBe(stableHash('42'));
    expect(stableHash('42')).not.toBe(stableHash('43'));
  });
});
