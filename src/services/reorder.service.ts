import config from '../config/environment';
import { PlaylistModel } from '../models/playlist.model';
import type {
  FeatureSource,
  GenreTagger,
  MissingFeaturesPolicy,
  OrderedTrack,
  PlaylistSink,
  PlaylistSource,
  PlaylistTrack,
  ReorderProgress,
  ReorderRequest,
  ReorderResult,
} from '../types/flow.types';
import { DuplicateTrackError, EmptyPlaylistError } from '../utils/errors';
import { ABSENT, type FeatureState, isPresent } from '../utils/feature-vector';
import logger from '../utils/logger';
import genreService from './genre.service';
import spotifyService from './spotify.service';
import tourService, { type TourService } from './tour.service';

export interface ReorderDependencies {
  source: PlaylistSource & FeatureSource;
  sink: PlaylistSink;
  tagger?: GenreTagger;
  tours?: TourService;
  missingFeatures?: MissingFeaturesPolicy;
  nameSuffix?: string;
}

type ProgressListener = (progress: ReorderProgress) => void;

/**
 * Playlist in, smoother playlist out:
 * fetch tracks and features, build the tour, optionally save it as a new playlist.
 */
class ReorderService {
  private readonly source: PlaylistSource & FeatureSource;
  private readonly sink: PlaylistSink;
  private readonly tagger?: GenreTagger;
  private readonly tours: TourService;
  private readonly missingFeatures: MissingFeaturesPolicy;
  private readonly nameSuffix: string;

  constructor(deps: ReorderDependencies) {
    this.source = deps.source;
    this.sink = deps.sink;
    this.tagger = deps.tagger;
    this.tours = deps.tours ?? tourService;
    this.missingFeatures = deps.missingFeatures ?? config.reorder.missingFeatures;
    this.nameSuffix = deps.nameSuffix ?? config.reorder.nameSuffix;
  }

  /**
   * Load a playlist into a model, keeping playlist order.
   * A track listed twice in the remote playlist is kept once.
   */
  async loadModel(playlistId: string, onProgress?: ProgressListener): Promise<PlaylistModel> {
    const tracks = await this.source.getPlaylistTracks(playlistId);
    onProgress?.({ stage: 'features', message: `Gathering features for ${tracks.length} tracks...` });

    const features = await this.fetchFeatures([...new Set(tracks.map(t => t.id))]);

    const model = new PlaylistModel();
    for (const track of tracks) {
      try {
        model.insert(track.id, { name: track.name, artist: track.artist }, features.get(track.id) ?? ABSENT);
      } catch (error) {
        if (!(error instanceof DuplicateTrackError)) {
          throw error;
        }
        logger.warn(`Playlist ${playlistId} lists "${track.name}" (${track.id}) more than once; keeping the first`);
      }
    }

    return model;
  }

  async reorder(request: ReorderRequest): Promise<ReorderResult> {
    const { playlistId, onProgress } = request;

    onProgress?.({ stage: 'loading', message: `Loading playlist ${playlistId}...` });
    const summary = await this.source.getPlaylist(playlistId);
    const model = await this.loadModel(playlistId, onProgress);

    onProgress?.({ stage: 'ordering', message: `Ordering ${model.size} tracks...` });
    const { tour } = this.tours.build(model, {
      seedId: request.seedId,
      missingFeatures: request.missingFeatures ?? this.missingFeatures,
    });

    const missingFeatureIds = model.missingFeatureIds();
    const cost = {
      original: this.tours.tourCost(model, model.orderedIds()),
      reordered: this.tours.tourCost(model, tour),
    };
    logger.info(
      `[Reorder] ${summary.name}: ${tour.length} tracks, ${missingFeatureIds.length} without features, ` +
        `distance ${cost.original.toFixed(2)} -> ${cost.reordered.toFixed(2)}`
    );

    const tracks: OrderedTrack[] = tour.map((id, position) => {
      const { metadata, features } = model.get(id);
      return { id, ...metadata, position, hasFeatures: isPresent(features) };
    });

    if (request.withGenres) {
      await this.tagGenres(tracks);
    }

    const name = request.name?.trim() || `${summary.name}${this.nameSuffix}`;
    const result: ReorderResult = { playlistId, name, order: tour, tracks, missingFeatureIds, cost };

    if (request.create) {
      if (tour.length === 0) {
        throw new EmptyPlaylistError(`Playlist ${summary.name} has no tracks to save`);
      }
      onProgress?.({ stage: 'creating', message: `Creating playlist "${name}"...` });
      const owner = await this.source.getCurrentUser();
      result.createdPlaylistId = await this.sink.createAndPopulate(owner.id, name, tour, {
        description: `${summary.name}, reordered so each track flows into the next`,
      });
    }

    onProgress?.({ stage: 'done', message: `${name} ready` });
    return result;
  }

  private async fetchFeatures(ids: string[]): Promise<Map<string, FeatureState>> {
    if (this.source.fetchFeaturesBatch) {
      return this.source.fetchFeaturesBatch(ids);
    }

    const features = new Map<string, FeatureState>();
    for (const id of ids) {
      features.set(id, await this.source.fetchFeatures(id));
    }
    return features;
  }

  private async tagGenres(tracks: Array<PlaylistTrack & { genre?: string | null }>): Promise<void> {
    if (!this.tagger) {
      return;
    }
    for (const track of tracks) {
      track.genre = await this.tagger.lookupGenre(track.name, track.artist);
    }
  }
}

export { ReorderService };

export default new ReorderService({
  source: spotifyService,
  sink: spotifyService,
  tagger: genreService,
});
