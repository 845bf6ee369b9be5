interface Block { i: number; j: number; size: number; }

/**
 * Longest common substring of a[alo, ahi) and b[blo, bhi). On ties the match
 * that starts earliest in `a` wins, then earliest in `b`.
 */
function longestMatch(
  a: readonly string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k };
    }
    j2len = next;
  }
  return best;
}

/** Total length of the matching blocks between `a` and `b`, in code points. */
export function countMatches(a: string, b: string): number {
  return countBlocks(Array.from(a), Array.from(b));
}

function countBlocks(a: readonly string[], b: readonly string[]): number {
  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const positions = b2j.get(b[j]);
    if (positions) positions.push(j);
    else b2j.set(b[j], [j]);
  }

  let matches = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  for (let range = queue.pop(); range; range = queue.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, b2j, alo, ahi, blo, bhi);
    if (size === 0) continue;
    matches += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }
  return matches;
}

/**
 * Ratcliff/Obershelp similarity in [0, 1]: twice the matched characters over
 * the combined length. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * countBlocks(left, right)) / total;
}
