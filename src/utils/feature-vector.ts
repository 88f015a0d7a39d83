import { InvalidDimensionError } from './errors';

/**
 * Audio-feature axes a track is compared on. Position in this list is the
 * position in every FeatureVector, so two vectors are always dimension-aligned.
 */
export const FEATURE_AXES = [
  'danceability',
  'energy',
  'instrumentalness',
  'loudness',
  'speechiness',
  'tempo',
  'valence',
] as const;

export type FeatureAxis = (typeof FEATURE_AXES)[number];

export const FEATURE_DIMENSION = FEATURE_AXES.length;

export type FeatureVector = readonly number[];

/**
 * Whether a track has a descriptor at all. "absent" is not the same as a
 * vector of zeros and is never turned into one.
 */
export type FeatureState =
  | { kind: 'present'; vector: FeatureVector }
  | { kind: 'absent' };

export const ABSENT: FeatureState = Object.freeze({ kind: 'absent' });

export function present(vector: FeatureVector): FeatureState {
  assertDimension(vector);
  return { kind: 'present', vector: Object.freeze([...vector]) };
}

export function isPresent(state: FeatureState): state is { kind: 'present'; vector: FeatureVector } {
  return state.kind === 'present';
}

export function assertDimension(vector: FeatureVector): void {
  if (vector.length !== FEATURE_DIMENSION) {
    throw new InvalidDimensionError(
      `Feature vector has ${vector.length} dimensions, expected ${FEATURE_DIMENSION}`
    );
  }
}

/**
 * Project a record with named feature fields onto the fixed axis order.
 * Extra fields (key, mode, acousticness...) are ignored.
 */
export function toFeatureVector(record: Partial<Record<FeatureAxis, unknown>>): FeatureVector {
  return FEATURE_AXES.map(axis => {
    const value = record[axis];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidDimensionError(`Feature "${axis}" is missing or not a finite number`);
    }
    return value;
  });
}

/** Same as toFeatureVector but wrapped as a FeatureState; null/undefined input is absent. */
export function toFeatureState(record: Partial<Record<FeatureAxis, unknown>> | null | undefined): FeatureState {
  if (!record) {
    return ABSENT;
  }
  return present(toFeatureVector(record));
}
