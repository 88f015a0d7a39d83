import type { TrackMetadata } from '../types/flow.types';
import { DuplicateTrackError, EmptyPlaylistError, UnknownTrackError } from '../utils/errors';
import { type FeatureState, isPresent } from '../utils/feature-vector';

export interface TrackEntry {
  readonly metadata: Readonly<TrackMetadata>;
  readonly features: FeatureState;
}

/**
 * Track id → (metadata, features) for one playlist.
 *
 * Insertion order is kept in its own append-only list rather than relying on
 * Map iteration order: the first inserted id is the default seed of a tour.
 * Filled once during loading, read-only afterwards.
 */
export class PlaylistModel {
  private readonly entries = new Map<string, TrackEntry>();
  private readonly order: string[] = [];

  get size(): number {
    return this.order.length;
  }

  insert(id: string, metadata: TrackMetadata, features: FeatureState): void {
    if (this.entries.has(id)) {
      throw new DuplicateTrackError(id);
    }
    this.entries.set(id, Object.freeze({ metadata: Object.freeze({ ...metadata }), features }));
    this.order.push(id);
  }

  get(id: string): TrackEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new UnknownTrackError(id);
    }
    return entry;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  firstInserted(): string {
    if (this.order.length === 0) {
      throw new EmptyPlaylistError();
    }
    return this.order[0];
  }

  ids(): ReadonlySet<string> {
    return new Set(this.order);
  }

  /** Ids in insertion order */
  orderedIds(): readonly string[] {
    return [...this.order];
  }

  /** Ids whose features are absent, in insertion order */
  missingFeatureIds(): string[] {
    return this.order.filter(id => !isPresent(this.get(id).features));
  }
}
