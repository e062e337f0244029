/**
 * Ratcliff/Obershelp similarity: 2 * matched / (|a| + |b|), where matched
 * counts characters in the longest common block plus, recursively, the
 * blocks found to its left and right.
 */
export function sceneSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchedChars(a, 0, a.length, b, 0, b.length)) / total;
}

function matchedChars(a: string, aLo: number, aHi: number, b: string, bLo: number, bHi: number): number {
  if (aLo >= aHi || bLo >= bHi) return 0;
  const [i, j, size] = longestBlock(a, aLo, aHi, b, bLo, bHi);
  if (size === 0) return 0;
  return (
    size +
    matchedChars(a, aLo, i, b, bLo, j) +
    matchedChars(a, i + size, aHi, b, j + size, bHi)
  );
}

// Earliest longest common substring of a[aLo..aHi) and b[bLo..bHi).
function longestBlock(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number,
): [number, number, number] {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;
  let prev = new Array<number>(bHi - bLo + 1).fill(0);
  for (let i = aLo; i < aHi; i++) {
    const row = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = prev[j - bLo] + 1;
      row[j - bLo + 1] = size;
      if (size > bestSize) {
        bestSize = size;
        bestI = i - size + 1;
        bestJ = j - size + 1;
      }
    }
    prev = row;
  }
  return [bestI, bestJ, bestSize];
}
