interface Block {
  a: number;
  b: number;
  size: number;
}

function longestCommonBlock(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number,
): Block {
  let best: Block = { a: aLo, b: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i += 1) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j += 1) {
      if (a[i] !== b[j]) {
        continue;
      }
      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }
    previous = current;
  }
  return best;
}

/**
 * Characters covered by the longest common block and, recursively, the blocks
 * on either side of it.
 */
export function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const pending: Array<[number, number, number, number]> = [
    [0, a.length, 0, b.length],
  ];

  while (pending.length) {
    const range = pending.pop();
    if (!range) {
      break;
    }
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestCommonBlock(a, aLo, aHi, b, bLo, bHi);
    if (!block.size) {
      continue;
    }
    total += block.size;
    if (aLo < block.a && bLo < block.b) {
      pending.push([aLo, block.a, bLo, block.b]);
    }
    if (block.a + block.size < aHi && block.b + block.size < bHi) {
      pending.push([block.a + block.size, aHi, block.b + block.size, bHi]);
    }
  }
  return total;
}

/** `2 * matches / (len(a) + len(b))`; two empty strings are identical. */
export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  return length ? (2 * matchingCharacters(a, b)) / length : 1;
}

export function titleSimilarity(a: string, b: string): number {
  return similarityRatio(a.trim().toLowerCase(), b.trim().toLowerCase());
}
