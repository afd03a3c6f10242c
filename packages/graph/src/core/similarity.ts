/**
 * Ratcliff/Obershelp "gestalt" similarity: twice the number of characters in
 * recursively found longest common blocks, divided by the total length.
 */

interface Block {
  a: number;
  b: number;
  size: number;
}

// Earliest longest common block of a[aLo..aHi) and b[bLo..bHi).
function longestBlock(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Block {
  let best: Block = { a: aLo, b: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);
  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
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

function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    const block = longestBlock(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;
    total += block.size;
    if (aLo < block.a && bLo < block.b) {
      queue.push([aLo, block.a, bLo, block.b]);
    }
    if (block.a + block.size < aHi && block.b + block.size < bHi) {
      queue.push([block.a + block.size, aHi, block.b + block.size, bHi]);
    }
  }
  return total;
}

/**
 * Similarity ratio in [0, 1]. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}
