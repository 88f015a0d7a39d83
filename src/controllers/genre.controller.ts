import type { Request, Response } from 'express';
import { sendError } from '../middleware/error.middleware';
import genreService, { type GenreService } from '../services/genre.service';
import { ValidationError } from '../utils/errors';

export class GenreController {
  constructor(private readonly genres: Pick<GenreService, 'isConfigured' | 'lookupGenre'> = genreService) {}

  /**
   * GET /api/genre?track=&artist=
   */
  async lookup(req: Request, res: Response): Promise<void> {
    try {
      const { track, artist } = req.query;
      if (typeof track !== 'string' || track.trim() === '' || typeof artist !== 'string' || artist.trim() === '') {
        throw new ValidationError('track and artist query parameters are required');
      }

      const genre = await this.genres.lookupGenre(track.trim(), artist.trim());
      res.json({ track: track.trim(), artist: artist.trim(), genre, configured: this.genres.isConfigured() });
    } catch (error) {
      sendError(res, error, 'Genre lookup failed');
    }
  }
}

export default new GenreController();
