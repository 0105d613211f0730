export function euclideanDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/** Scales a vector to unit length. A zero vector is returned unchanged. */
export function normalize(vector: number[]): number[] {
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }
  if (norm === 0) {
    return [...vector];
  }
  const scale = 1 / Math.sqrt(norm);
  return vector.map((value) => value * scale);
}

/**
 * Maps a Euclidean distance between unit vectors (0..2) onto a 0..1 similarity.
 * For unit vectors this equals their cosine similarity, floored at 0.
 */
export function distanceToSimilarity(distance: number): number {
  if (!Number.isFinite(distance)) {
    return 0;
  }
  const similarity = 1 - (distance * distance) / 2;
  return Math.max(0, Math.min(1, similarity));
}
