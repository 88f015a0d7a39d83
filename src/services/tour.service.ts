import type { PlaylistModel } from '../models/playlist.model';
import type { MissingFeaturesPolicy, Tour, TourOptions } from '../types/flow.types';
import { distance } from '../utils/distance';
import { MissingFeaturesError, EmptyPlaylistError } from '../utils/errors';
import { type FeatureVector, isPresent } from '../utils/feature-vector';

export interface TourBuild {
  tour: Tour;
  seedId: string | null;
  /** Nearest-neighbour steps taken, one per track after the seed */
  iterations: number;
}

/**
 * Orders tracks with a greedy nearest-neighbour walk through feature space:
 * start at the seed, then keep appending whichever unvisited track is closest
 * to the last one appended. O(n²), fine for playlist-sized inputs.
 */
class TourService {
  private readonly defaultPolicy: MissingFeaturesPolicy = 'append';

  /**
   * Build a tour over every track in the model.
   *
   * Seed is `options.seedId` when given, otherwise the earliest-inserted track
   * that has features. Ties go to the candidate inserted first.
   * Tracks without features are appended last in insertion order ("append")
   * or make the whole call fail ("reject").
   */
  build(model: PlaylistModel, options: TourOptions = {}): TourBuild {
    const policy = options.missingFeatures ?? this.defaultPolicy;
    const allowEmpty = options.allowEmpty ?? true;

    if (model.size === 0) {
      if (!allowEmpty) {
        throw new EmptyPlaylistError();
      }
      return { tour: [], seedId: null, iterations: 0 };
    }

    const missing = model.missingFeatureIds();
    if (policy === 'reject' && missing.length > 0) {
      throw new MissingFeaturesError(missing);
    }

    const seedId = this.pickSeed(model, options.seedId);
    if (seedId === null) {
      // Nothing can be compared; fall back to playlist order
      return { tour: [...model.orderedIds()], seedId: null, iterations: 0 };
    }

    const missingSet = new Set(missing);
    const remaining = model
      .orderedIds()
      .filter(id => id !== seedId && !missingSet.has(id))
      .map(id => ({ id, vector: this.vectorOf(model, id) }));

    const tour: Tour = [seedId];
    let current = this.vectorOf(model, seedId);
    let iterations = 0;

    while (remaining.length > 0) {
      let bestIndex = 0;
      let bestDistance = Infinity;

      for (let i = 0; i < remaining.length; i++) {
        const d = distance(current, remaining[i].vector);
        // strict: earliest candidate wins a tie
        if (d < bestDistance) {
          bestDistance = d;
          bestIndex = i;
        }
      }

      const [next] = remaining.splice(bestIndex, 1);
      tour.push(next.id);
      current = next.vector;
      iterations++;
    }

    tour.push(...missing);
    this.assertPermutation(model, tour);

    return { tour, seedId, iterations };
  }

  buildTour(model: PlaylistModel, options?: TourOptions): Tour {
    return this.build(model, options).tour;
  }

  /**
   * Sum of distances between neighbouring tracks in `order`.
   * Pairs where either side has no features are skipped.
   */
  tourCost(model: PlaylistModel, order: readonly string[]): number {
    let total = 0;
    for (let i = 1; i < order.length; i++) {
      const prev = model.get(order[i - 1]).features;
      const next = model.get(order[i]).features;
      if (isPresent(prev) && isPresent(next)) {
        total += distance(prev.vector, next.vector);
      }
    }
    return total;
  }

  private pickSeed(model: PlaylistModel, requested?: string): string | null {
    if (requested !== undefined) {
      const entry = model.get(requested);
      if (!isPresent(entry.features)) {
        throw new MissingFeaturesError([requested]);
      }
      return requested;
    }

    const first = model.firstInserted();
    if (isPresent(model.get(first).features)) {
      return first;
    }
    return model.orderedIds().find(id => isPresent(model.get(id).features)) ?? null;
  }

  private vectorOf(model: PlaylistModel, id: string): FeatureVector {
    const features = model.get(id).features;
    if (!isPresent(features)) {
      throw new MissingFeaturesError([id]);
    }
    return features.vector;
  }

  private assertPermutation(model: PlaylistModel, tour: Tour): void {
    const ids = model.ids();
    const seen = new Set(tour);
    if (tour.length !== ids.size || seen.size !== tour.length || [...ids].some(id => !seen.has(id))) {
      throw new Error(`Tour of ${tour.length} tracks is not a permutation of ${ids.size} playlist tracks`);
    }
  }
}

export { TourService };

export default new TourService();
