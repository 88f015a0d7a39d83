import { InvalidDimensionError } from './errors';
import { FEATURE_DIMENSION, type FeatureVector } from './feature-vector';

/**
 * Euclidean distance between two feature vectors.
 * Both must have exactly FEATURE_DIMENSION components.
 */
export function distance(a: FeatureVector, b: FeatureVector): number {
  if (a.length !== FEATURE_DIMENSION || b.length !== FEATURE_DIMENSION || a.length !== b.length) {
    throw new InvalidDimensionError(
      `Cannot compare vectors of length ${a.length} and ${b.length} (expected ${FEATURE_DIMENSION})`
    );
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}
