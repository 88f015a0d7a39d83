import type { FeatureState } from '../utils/feature-vector';

export interface TrackMetadata {
  name: string;
  artist: string;
}

/** A playlist entry as it comes back from the playlist source, in playlist order. */
export interface PlaylistTrack extends TrackMetadata {
  id: string;
}

export interface PlaylistSummary {
  id: string;
  name: string;
  ownerId: string;
  trackCount: number;
}

/** Ordered sequence of every track id in a model, each exactly once. */
export type Tour = string[];

/**
 * What to do with tracks whose audio features could not be fetched.
 * - append: leave them out of the nearest-neighbour search and put them last, in playlist order
 * - reject: fail with MissingFeaturesError naming them
 */
export type MissingFeaturesPolicy = 'append' | 'reject';

export interface TourOptions {
  seedId?: string;
  missingFeatures?: MissingFeaturesPolicy;
  /** When false an empty model throws EmptyPlaylistError instead of yielding [] */
  allowEmpty?: boolean;
}

// Collaborator contracts

export interface FeatureSource {
  fetchFeatures(trackId: string): Promise<FeatureState>;
  fetchFeaturesBatch?(trackIds: string[]): Promise<Map<string, FeatureState>>;
}

export interface PlaylistSource {
  getPlaylist(playlistId: string): Promise<PlaylistSummary>;
  getPlaylistTracks(playlistId: string): Promise<PlaylistTrack[]>;
  getCurrentUser(): Promise<{ id: string; displayName: string }>;
}

export interface CreatePlaylistOptions {
  public?: boolean;
  description?: string;
}

export interface PlaylistSink {
  createAndPopulate(
    ownerId: string,
    name: string,
    trackIds: string[],
    options?: CreatePlaylistOptions
  ): Promise<string>;
}

export interface GenreTagger {
  lookupGenre(trackName: string, artistName: string): Promise<string | null>;
}

// Reorder flow

export type ReorderStage = 'loading' | 'features' | 'ordering' | 'creating' | 'done';

export interface ReorderProgress {
  stage: ReorderStage;
  message: string;
}

export interface ReorderRequest {
  playlistId: string;
  seedId?: string;
  missingFeatures?: MissingFeaturesPolicy;
  create?: boolean;
  name?: string;
  withGenres?: boolean;
  onProgress?: (progress: ReorderProgress) => void;
}

export interface OrderedTrack extends PlaylistTrack {
  position: number;
  hasFeatures: boolean;
  genre?: string | null;
}

export interface ReorderResult {
  playlistId: string;
  name: string;
  order: Tour;
  tracks: OrderedTrack[];
  missingFeatureIds: string[];
  cost: {
    original: number;
    reordered: number;
  };
  createdPlaylistId?: string;
}
