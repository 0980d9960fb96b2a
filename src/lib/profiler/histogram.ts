/**
 * Equal-width and explicit-edge histograms.
 * Every bin is half-open except the last, which is closed on the right;
 * values outside the edges are not counted.
 */

/**
 * Index of the first element greater than x in an ascending array
 */
export function bisectRight(sorted: readonly number[], x: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (x < (sorted[mid] ?? Number.POSITIVE_INFINITY)) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

/**
 * count + 1 evenly spaced edges from lo to hi, the last one exactly hi
 */
export function linspace(lo: number, hi: number, count: number): number[] {
  const step = (hi - lo) / count;
  const edges: number[] = [];
  for (let i = 0; i < count; i++) {
    edges.push(lo + i * step);
  }
  edges.push(hi);
  return edges;
}

export interface Histogram {
  edges: number[];
  counts: number[];
}

/**
 * Histogram over binSize equal-width bins spanning [lo, hi] (lo < hi)
 */
export function uniformHistogram(
  measures: readonly number[],
  binSize: number,
  range: [number, number],
): Histogram {
  const [lo, hi] = range;
  const edges = linspace(lo, hi, binSize);
  const counts = new Array<number>(binSize).fill(0);
  const scale = binSize / (hi - lo);

  for (const x of measures) {
    if (x < lo || x > hi) continue;

    let index = Math.floor((x - lo) * scale);
    if (index >= binSize) index = binSize - 1;
    // Guard against edges that rounding put on the other side of x
    if (x < (edges[index] ?? lo)) index -= 1;
    else if (index < binSize - 1 && x >= (edges[index + 1] ?? hi)) index += 1;

    counts[index] = (counts[index] ?? 0) + 1;
  }

  return { edges, counts };
}

/**
 * Histogram over caller-supplied ascending edges; returns edges.length - 1 counts
 */
export function histogramByEdges(
  measures: readonly number[],
  edges: readonly number[],
): number[] {
  const binCount = Math.max(0, edges.length - 1);
  const counts = new Array<number>(binCount).fill(0);
  const last = edges[edges.length - 1];

  for (const x of measures) {
    let index = bisectRight(edges, x) - 1;
    if (x === last) index = binCount - 1;
    if (index < 0 || index >= binCount) continue;
    counts[index] = (counts[index] ?? 0) + 1;
  }

  return counts;
}
