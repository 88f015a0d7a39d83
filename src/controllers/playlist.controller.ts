import type { Request, Response } from 'express';
import { sendError } from '../middleware/error.middleware';
import reorderService, { type ReorderService } from '../services/reorder.service';
import spotifyService, { type SpotifyService } from '../services/spotify.service';
import { isPresent } from '../utils/feature-vector';
import { parsePlaylistId, parseReorderOptions } from '../utils/validation';

export class PlaylistController {
  constructor(
    private readonly spotify: Pick<SpotifyService, 'getUserPlaylists'> = spotifyService,
    private readonly reorderer: Pick<ReorderService, 'loadModel' | 'reorder'> = reorderService
  ) {}

  /**
   * GET /api/playlists
   * Playlists of the authorized user
   */
  async getAll(_req: Request, res: Response): Promise<void> {
    try {
      const playlists = await this.spotify.getUserPlaylists();
      res.json({ playlists });
    } catch (error) {
      sendError(res, error, 'Failed to get playlists');
    }
  }

  /**
   * GET /api/playlists/:id/tracks
   * Tracks in playlist order, with whether each has audio features
   */
  async getTracks(req: Request, res: Response): Promise<void> {
    try {
      const playlistId = parsePlaylistId(req.params.id);
      const model = await this.reorderer.loadModel(playlistId);

      const tracks = model.orderedIds().map(id => {
        const { metadata, features } = model.get(id);
        return { id, ...metadata, hasFeatures: isPresent(features) };
      });

      res.json({ playlistId, tracks, missingFeatureIds: model.missingFeatureIds() });
    } catch (error) {
      sendError(res, error, 'Failed to get playlist tracks');
    }
  }

  /**
   * POST /api/playlists/:id/reorder
   * Body: { seedId?, missingFeatures?, create?, name?, withGenres? }
   */
  async reorder(req: Request, res: Response): Promise<void> {
    try {
      const playlistId = parsePlaylistId(req.params.id);
      const options = parseReorderOptions(req.body);

      const result = await this.reorderer.reorder({ playlistId, ...options });
      res.status(result.createdPlaylistId ? 201 : 200).json(result);
    } catch (error) {
      sendError(res, error, 'Failed to reorder playlist');
    }
  }
}

export default new PlaylistController();
