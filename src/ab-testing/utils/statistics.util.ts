const LANCZOS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
];

/** Abramowitz/Stegun 7.1.26, absolute error below 1.5e-7. */
export function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const absX = Math.abs(x);
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const t = 1 / (1 + p * absX);
  const y = 1 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(
    -absX * absX,
  );
  return sign * y;
}

export function normalCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

export function logGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - logGamma(
      1 - x,
    );
  }
  const z = x - 1;
  let sum = LANCZOS[0];
  for (let i = 1; i < LANCZOS.length; i += 1) {
    sum += LANCZOS[i] / (z + i);
  }
  const t = z + 7.5;
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(
    sum,
  );
}

/** Regularized lower incomplete gamma P(a, x). */
export function lowerRegularizedGamma(a: number, x: number): number {
  if (x <= 0) {
    return 0;
  }
  const logPrefix = a * Math.log(x) - x - logGamma(a);

  if (x < a + 1) {
    let term = 1 / a;
    let sum = term;
    for (let n = 1; n < 500; n += 1) {
      term *= x / (a + n);
      sum += term;
      if (Math.abs(term) < Math.abs(sum) * 1e-14) {
        break;
      }
    }
    return Math.min(1, sum * Math.exp(logPrefix));
  }

  // Lentz continued fraction for the upper tail
  const tiny = 1e-300;
  let b = x + 1 - a;
  let c = 1 / tiny;
  let d = 1 / b;
  let h = d;
  for (let n = 1; n < 500; n += 1) {
    const an = -n * (n - a);
    b += 2;
    d = an * d + b;
    if (Math.abs(d) < tiny) {
      d = tiny;
    }
    c = b + an / c;
    if (Math.abs(c) < tiny) {
      c = tiny;
    }
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < 1e-14) {
      break;
    }
  }
  return Math.max(0, 1 - Math.exp(logPrefix) * h);
}

export function chiSquaredCdf(x: number, degreesOfFreedom: number): number {
  return lowerRegularizedGamma(degreesOfFreedom / 2, x / 2);
}

/** 1 - p of a two-sided pooled two-proportion z-test. */
export function twoProportionSignificance(
  successes: [number, number],
  trials: [number, number],
): number {
  const [s1, s2] = successes;
  const [n1, n2] = trials;
  if (n1 <= 0 || n2 <= 0) {
    return 0;
  }
  const pooled = (s1 + s2) / (n1 + n2);
  const standardError = Math.sqrt(pooled * (1 - pooled) * (1 / n1 + 1 / n2));
  if (!(standardError > 0)) {
    return 0;
  }
  const z = Math.abs(s1 / n1 - s2 / n2) / standardError;
  return 1 - 2 * (1 - normalCdf(z));
}

/**
 * 1 - p of a chi-squared test of equal success rates across k groups (df = k -
 * 1).
 */
export function chiSquaredSignificance(
  successes: number[],
  trials: number[],
): number {
  const totalTrials = trials.reduce((sum, value) => sum + value, 0);
  if (totalTrials <= 0) {
    return 0;
  }
  const expectedRate = successes.reduce(
    (sum, value) => sum + value,
    0,
  ) / totalTrials;
  const expected = trials.map((value) => expectedRate * value);
  if (!expected.every((value) => value > 0)) {
    return 0;
  }
  const statistic = successes.reduce(
    (sum, observed, index) => sum + (
      observed - expected[index]
    ) ** 2 / expected[index],
    0,
  );
  return chiSquaredCdf(statistic, successes.length - 1);
}

/** FNV-1a over the UTF-16 code units. */
export function stableHash(input: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
