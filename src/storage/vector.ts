/**
 * Cosine distance (1 - cosine similarity), the `<=>` operator of pgvector.
 * Zero-length vectors have no direction; they are treated as orthogonal to everything.
 */
export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) throw new RangeError(`Vector length ${a.length} vs ${b.length}`);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 1;
  const distance = 1 - dot / denom;
  // float noise on identical directions
  if (Math.abs(distance) < 1e-12) return 0;
  return Math.min(2, Math.max(0, distance));
}

/** Distance mapped to (0, 1]; 1 for an exact match. */
export function similarityFromDistance(distance: number): number {
  return 1 / (1 + distance);
}

/** pgvector text literal, e.g. "[0.1,0.2,0.3]". */
export function toVectorLiteral(vector: number[]): string {
  return `[${vector.map((x) => Number(x.toFixed(8))).join(",")}]`;
}

export function parseVectorLiteral(literal: string): number[] {
  const body = literal.trim().replace(/^\[/, "").replace(/\]$/, "").trim();
  if (!body) return [];
  return body.split(",").map((part) => {
    const value = Number(part);
    if (!Number.isFinite(value)) throw new RangeError(`Not a vector literal: ${literal.slice(0, 40)}`);
    return value;
  });
}
