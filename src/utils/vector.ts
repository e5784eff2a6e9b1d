export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function l2Norm(values: readonly number[]): number {
  return Math.sqrt(dot(values, values));
}

/** Returns a unit-length copy, or null when the vector has no usable length. */
export function l2Normalize(values: readonly number[]): number[] | null {
  const norm = l2Norm(values);
  if (!Number.isFinite(norm) || norm === 0) {
    return null;
  }
  return values.map((value) => value / norm);
}

export function isFiniteVector(values: readonly number[]): boolean {
  return values.every((value) => Number.isFinite(value));
}
