/**
 * Partial top-k selection.
 *
 * Keeps the k best entries in a bounded min-heap (the heap root is the worst
 * entry kept), so only the k survivors are ever sorted. Equal scores rank by
 * ascending index, which makes the result deterministic.
 */

export interface RankedIndex {
  index: number;
  score: number;
}

/** true when `a` ranks ahead of `b` */
export function ranksBefore(a: RankedIndex, b: RankedIndex): boolean {
  return a.score > b.score || (a.score === b.score && a.index < b.index);
}

function siftUp(heap: RankedIndex[], i: number): void {
  while (i > 0) {
    const parent = (i - 1) >> 1;
    if (!ranksBefore(heap[parent], heap[i])) break;
    [heap[parent], heap[i]] = [heap[i], heap[parent]];
    i = parent;
  }
}

function siftDown(heap: RankedIndex[], i: number): void {
  for (;;) {
    const left = 2 * i + 1;
    const right = left + 1;
    let worst = i;
    if (left < heap.length && ranksBefore(heap[worst], heap[left])) worst = left;
    if (right < heap.length && ranksBefore(heap[worst], heap[right])) worst = right;
    if (worst === i) return;
    [heap[worst], heap[i]] = [heap[i], heap[worst]];
    i = worst;
  }
}

/**
 * Indices of the `k` highest scores, best first. NaN scores rank last.
 */
export function selectTopK(scores: ArrayLike<number>, k: number): RankedIndex[] {
  const limit = Math.min(k, scores.length);
  if (limit <= 0) return [];

  const heap: RankedIndex[] = [];
  for (let index = 0; index < scores.length; index++) {
    const raw = scores[index];
    const entry = { index, score: Number.isNaN(raw) ? -Infinity : raw };
    if (heap.length < limit) {
      heap.push(entry);
      siftUp(heap, heap.length - 1);
    } else if (ranksBefore(entry, heap[0])) {
      heap[0] = entry;
      siftDown(heap, 0);
    }
  }

  return heap.sort((a, b) => (ranksBefore(a, b) ? -1 : 1));
}
