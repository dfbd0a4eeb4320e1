/**
 * Ratcliff/Obershelp sequence similarity.
 *
 * Finds the longest common block, then recurses into the unmatched text on
 * either side of it. The ratio is 2·M / T where M is the total size of the
 * matched blocks and T the combined length of both strings.
 */

export interface MatchingBlock {
  /** Start offset in `a` */
  a: number;
  /** Start offset in `b` */
  b: number;
  size: number;
}

/**
 * Index every character of `b` to the ascending list of its positions
 */
function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j]);
    if (list) {
      list.push(j);
    } else {
      positions.set(b[j], [j]);
    }
  }
  return positions;
}

/**
 * Longest common block of a[aLo:aHi] and b[bLo:bHi].
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
export function findLongestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
  positions: Map<string, number[]> = indexPositions(b)
): MatchingBlock {
  let bestA = aLo;
  let bestB = bLo;
  let bestSize = 0;

  // runLength.get(j) = length of the common run ending at a[i - 1], b[j]
  let runLength = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRunLength = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;

      const size = (runLength.get(j - 1) ?? 0) + 1;
      nextRunLength.set(j, size);

      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }
    runLength = nextRunLength;
  }

  return { a: bestA, b: bestB, size: bestSize };
}

/**
 * All matching blocks in ascending order, found by recursive longest-match
 */
export function getMatchingBlocks(a: string, b: string): MatchingBlock[] {
  const positions = indexPositions(b);
  const blocks: MatchingBlock[] = [];
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;

    const block = findLongestMatch(a, b, aLo, aHi, bLo, bHi, positions);
    if (block.size === 0) continue;

    blocks.push(block);
    if (aLo < block.a && bLo < block.b) {
      pending.push([aLo, block.a, bLo, block.b]);
    }
    if (block.a + block.size < aHi && block.b + block.size < bHi) {
      pending.push([block.a + block.size, aHi, block.b + block.size, bHi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * Similarity ratio in [0, 1]. Two empty strings are identical (1).
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }

  const matched = getMatchingBlocks(a, b).reduce(
    (sum, block) => sum + block.size,
    0
  );

  return (2 * matched) / total;
}
