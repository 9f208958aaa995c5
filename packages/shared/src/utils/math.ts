/**
 * Cosine similarity between two sparse term-weight vectors.
 * Terms missing from one side contribute nothing to the dot product.
 */
export function cosineSimilarity(
  a: ReadonlyMap<string, number>,
  b: ReadonlyMap<string, number>,
): number {
  if (a.size === 0 || b.size === 0) return 0;

  let dotProduct = 0;
  for (const [term, weight] of a) {
    const other = b.get(term);
    if (other !== undefined) {
      dotProduct += weight * other;
    }
  }

  const magnitude = magnitudeOf(a) * magnitudeOf(b);
  return magnitude === 0 ? 0 : dotProduct / magnitude;
}

function magnitudeOf(vector: ReadonlyMap<string, number>): number {
  let sum = 0;
  for (const weight of vector.values()) {
    sum += weight * weight;
  }
  return Math.sqrt(sum);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
