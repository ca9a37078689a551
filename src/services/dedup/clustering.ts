/**
 * Average-linkage agglomerative clustering on cosine distance
 *
 * Groups passed in here are the records sharing one (value, currency) key,
 * so they are small; the O(n^3) merge loop over a full distance matrix is
 * fine at that size. Merging stops once the closest pair of clusters is at
 * or beyond the distance threshold. Ties break on the lowest cluster pair,
 * which keeps the result a pure function of the input order.
 *
 * @module services/dedup/clustering
 */

/**
 * Cosine distance in [0, 2]. A zero vector is at distance 1 from everything.
 */
export function cosineDistance(a: Float32Array | number[], b: Float32Array | number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Clamp floating point drift
  return 1 - Math.max(-1, Math.min(1, similarity));
}

/**
 * Cluster vectors and return the member indices of each cluster.
 * Members are ascending; clusters are ordered by their first member.
 */
export function averageLinkageClusters(
  vectors: ReadonlyArray<Float32Array | number[]>,
  threshold: number
): number[][] {
  const n = vectors.length;
  const clusters: number[][] = vectors.map((_, i) => [i]);
  if (n < 2) {
    return clusters;
  }

  // dist[i][j] holds the average linkage distance between clusters i and j
  const dist: number[][] = [];
  for (let i = 0; i < n; i++) {
    dist.push(new Array<number>(n).fill(0));
  }
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const d = cosineDistance(vectors[i], vectors[j]);
      dist[i][j] = d;
      dist[j][i] = d;
    }
  }

  const active = new Array<boolean>(n).fill(true);
  let remaining = n;

  while (remaining > 1) {
    let bestI = -1;
    let bestJ = -1;
    let best = Number.POSITIVE_INFINITY;
    for (let i = 0; i < n; i++) {
      if (!active[i]) continue;
      for (let j = i + 1; j < n; j++) {
        if (active[j] && dist[i][j] < best) {
          best = dist[i][j];
          bestI = i;
          bestJ = j;
        }
      }
    }

    if (bestI < 0 || best >= threshold) {
      break;
    }

    // Lance-Williams update for average linkage, merging j into i
    const sizeI = clusters[bestI].length;
    const sizeJ = clusters[bestJ].length;
    for (let k = 0; k < n; k++) {
      if (!active[k] || k === bestI || k === bestJ) continue;
      const d = (sizeI * dist[bestI][k] + sizeJ * dist[bestJ][k]) / (sizeI + sizeJ);
      dist[bestI][k] = d;
      dist[k][bestI] = d;
    }
    clusters[bestI] = [...clusters[bestI], ...clusters[bestJ]].sort((x, y) => x - y);
    clusters[bestJ] = [];
    active[bestJ] = false;
    remaining--;
  }

  return clusters.filter((_, i) => active[i]);
}
