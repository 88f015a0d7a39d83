import crypto from 'crypto';
import type { Request, Response } from 'express';
import { sendError } from '../middleware/error.middleware';
import spotifyService, { type SpotifyService } from '../services/spotify.service';
import { ValidationError } from '../utils/errors';

type SpotifyAuth = Pick<
  SpotifyService,
  'isConfigured' | 'canModifyPlaylists' | 'getAuthorizeUrl' | 'exchangeCode'
>;

const STATE_TTL_MS = 10 * 60 * 1000;
const MAX_PENDING_STATES = 100;

export class SpotifyController {
  // state handed out by /login → when it expires; consumed by /callback
  private readonly pendingStates = new Map<string, number>();

  constructor(
    private readonly spotify: SpotifyAuth = spotifyService,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * GET /api/spotify/status
   */
  getStatus(_req: Request, res: Response): void {
    const configured = this.spotify.isConfigured();
    const authorized = this.spotify.canModifyPlaylists();

    res.json({
      configured,
      authorized,
      message: !configured
        ? 'Spotify API credentials not configured. Set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET in .env'
        : !authorized
          ? 'Spotify API is configured. Open /api/spotify/login to allow reading and creating playlists'
          : 'Spotify API is configured and authorized',
    });
  }

  /**
   * GET /api/spotify/login
   * Redirects to Spotify's consent page
   */
  login(_req: Request, res: Response): void {
    try {
      const state = crypto.randomBytes(16).toString('hex');
      const url = this.spotify.getAuthorizeUrl(state);
      this.rememberState(state);
      res.redirect(url);
    } catch (error) {
      sendError(res, error, 'Failed to start Spotify login');
    }
  }

  /**
   * GET /api/spotify/callback?code=&state=
   */
  async callback(req: Request, res: Response): Promise<void> {
    try {
      const { code, state, error } = req.query;

      if (typeof error === 'string') {
        throw new ValidationError(`Spotify authorization was denied: ${error}`);
      }
      if (typeof state !== 'string' || !this.consumeState(state)) {
        throw new ValidationError('Unknown or expired authorization state');
      }
      if (typeof code !== 'string' || code.length === 0) {
        throw new ValidationError('Authorization code is required');
      }

      const refreshToken = await this.spotify.exchangeCode(code);
      res.json({
        success: true,
        refreshToken,
        message: 'Authorized. Save refreshToken as SPOTIFY_REFRESH_TOKEN in .env to keep access after a restart',
      });
    } catch (error) {
      sendError(res, error, 'Spotify authorization failed');
    }
  }

  private rememberState(state: string): void {
    const now = this.now();
    for (const [pending, expiresAt] of this.pendingStates) {
      if (expiresAt <= now) this.pendingStates.delete(pending);
    }
    // Oldest first
    for (const pending of this.pendingStates.keys()) {
      if (this.pendingStates.size < MAX_PENDING_STATES) break;
      this.pendingStates.delete(pending);
    }
    this.pendingStates.set(state, now + STATE_TTL_MS);
  }

  private consumeState(state: string): boolean {
    const expiresAt = this.pendingStates.get(state);
    this.pendingStates.delete(state);
    return expiresAt !== undefined && expiresAt > this.now();
  }
}

export default new SpotifyController();
