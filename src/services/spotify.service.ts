import axios, { type AxiosInstance } from 'axios';
import config from '../config/environment';
import logger from '../utils/logger';
import { chunk } from '../utils/chunk';
import { NotConfiguredError, SpotifyApiError } from '../utils/errors';
import { ABSENT, type FeatureState, toFeatureState } from '../utils/feature-vector';
import type {
  CreatePlaylistOptions,
  FeatureSource,
  PlaylistSink,
  PlaylistSource,
  PlaylistSummary,
  PlaylistTrack,
} from '../types/flow.types';
import type {
  SpotifyAudioFeatures,
  SpotifyPage,
  SpotifyPlaylistItem,
  SpotifyPlaylistObject,
  SpotifyTokenResponse,
  SpotifyUser,
} from '../types/spotify.types';

const ACCOUNTS_URL = 'https://accounts.spotify.com';
const API_URL = 'https://api.spotify.com/v1';

// Per-request limits of the Web API
const FEATURES_BATCH_SIZE = 100;
const ADD_TRACKS_BATCH_SIZE = 100;

export const SPOTIFY_SCOPES = [
  'playlist-read-private',
  'playlist-modify-public',
  'playlist-modify-private',
];

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  redirectUri: string;
}

export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;

class SpotifyService implements FeatureSource, PlaylistSource, PlaylistSink {
  private refreshToken: string | null;
  private accessToken: string | null = null;
  private tokenExpiry: number = 0;

  constructor(
    private readonly credentials: SpotifyCredentials = config.spotify,
    private readonly http: HttpClient = axios
  ) {
    this.refreshToken = credentials.refreshToken || null;

    if (!this.isConfigured()) {
      logger.warn('⚠️ Spotify API credentials not configured. Set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET in .env');
    } else if (!this.refreshToken) {
      logger.info('💡 No SPOTIFY_REFRESH_TOKEN set. Open /api/spotify/login to authorize playlist access.');
    }
  }

  /**
   * Check if Spotify API is configured
   */
  isConfigured(): boolean {
    return this.credentials.clientId !== '' && this.credentials.clientSecret !== '';
  }

  /**
   * Creating playlists needs a user token, which only the refresh-token flow gives us
   */
  canModifyPlaylists(): boolean {
    return this.isConfigured() && this.refreshToken !== null;
  }

  /**
   * URL the user opens to grant playlist access
   */
  getAuthorizeUrl(state: string): string {
    this.ensureConfigured();
    const params = new URLSearchParams({
      client_id: this.credentials.clientId,
      response_type: 'code',
      redirect_uri: this.credentials.redirectUri,
      scope: SPOTIFY_SCOPES.join(' '),
      state,
    });
    return `${ACCOUNTS_URL}/authorize?${params.toString()}`;
  }

  /**
   * Trade an authorization code for tokens. The refresh token is kept for
   * this process and returned so it can be saved to .env.
   */
  async exchangeCode(code: string): Promise<string> {
    const token = await this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.credentials.redirectUri,
    });

    if (!token.refresh_token) {
      throw new SpotifyApiError('Spotify did not return a refresh token');
    }

    this.refreshToken = token.refresh_token;
    logger.info('✅ Spotify user authorization completed');
    return token.refresh_token;
  }

  async getCurrentUser(): Promise<{ id: string; displayName: string }> {
    const user = await this.get<SpotifyUser>(`${API_URL}/me`);
    return { id: user.id, displayName: user.display_name ?? user.id };
  }

  async getPlaylist(playlistId: string): Promise<PlaylistSummary> {
    const playlist = await this.get<SpotifyPlaylistObject>(
      `${API_URL}/playlists/${encodeURIComponent(playlistId)}`,
      { fields: 'id,name,owner(id,display_name),tracks(total)' }
    );
    return this.toSummary(playlist);
  }

  /**
   * Playlists the user created or follows. Without a user id, the current user's.
   */
  async getUserPlaylists(userId?: string): Promise<PlaylistSummary[]> {
    const first = userId
      ? `${API_URL}/users/${encodeURIComponent(userId)}/playlists?limit=50`
      : `${API_URL}/me/playlists?limit=50`;

    const items = await this.getAllPages<SpotifyPlaylistObject>(first);
    return items.map(playlist => this.toSummary(playlist));
  }

  /**
   * Tracks of a playlist in playlist order. Local files and removed tracks
   * have no id and are skipped.
   */
  async getPlaylistTracks(playlistId: string): Promise<PlaylistTrack[]> {
    const fields = encodeURIComponent('items(track(id,name,is_local,artists(id,name))),next,total');
    const items = await this.getAllPages<SpotifyPlaylistItem>(
      `${API_URL}/playlists/${encodeURIComponent(playlistId)}/tracks?limit=100&fields=${fields}`
    );

    const tracks: PlaylistTrack[] = [];
    for (const item of items) {
      const track = item.track;
      if (!track || !track.id || track.is_local) {
        logger.debug(`Skipping playlist item without a Spotify id: ${track?.name ?? '(removed)'}`);
        continue;
      }
      tracks.push({
        id: track.id,
        name: track.name,
        artist: track.artists[0]?.name ?? '',
      });
    }
    return tracks;
  }

  /**
   * Audio features of one track. Any failure means "no features".
   */
  async fetchFeatures(trackId: string): Promise<FeatureState> {
    try {
      const features = await this.get<SpotifyAudioFeatures | null>(
        `${API_URL}/audio-features/${encodeURIComponent(trackId)}`
      );
      return toFeatureState(features);
    } catch (error) {
      logger.warn(`No audio features for ${trackId}: ${this.describe(error)}`);
      return ABSENT;
    }
  }

  /**
   * Audio features for many tracks, 100 per request. A failed request marks
   * all of its ids as absent; it does not fail the whole batch.
   */
  async fetchFeaturesBatch(trackIds: string[]): Promise<Map<string, FeatureState>> {
    const result = new Map<string, FeatureState>();

    for (const ids of chunk(trackIds, FEATURES_BATCH_SIZE)) {
      let features: Array<SpotifyAudioFeatures | null> = [];
      try {
        const response = await this.get<{ audio_features: Array<SpotifyAudioFeatures | null> }>(
          `${API_URL}/audio-features`,
          { ids: ids.join(',') }
        );
        if (Array.isArray(response.audio_features)) {
          features = response.audio_features;
        } else {
          logger.warn(`Audio features response for ${ids.length} tracks has no audio_features list`);
        }
      } catch (error) {
        logger.warn(`Audio features request for ${ids.length} tracks failed: ${this.describe(error)}`);
      }

      ids.forEach((id, index) => {
        result.set(id, this.safeFeatureState(id, features[index]));
      });
    }

    return result;
  }

  /**
   * Create a playlist owned by `ownerId` and fill it with `trackIds` in order.
   * Tracks are added 100 at a time.
   * @returns id of the new playlist
   */
  async createAndPopulate(
    ownerId: string,
    name: string,
    trackIds: string[],
    options: CreatePlaylistOptions = {}
  ): Promise<string> {
    if (!this.canModifyPlaylists()) {
      throw new NotConfiguredError('Creating playlists needs SPOTIFY_REFRESH_TOKEN; open /api/spotify/login first');
    }

    const playlist = await this.post<{ id: string }>(
      `${API_URL}/users/${encodeURIComponent(ownerId)}/playlists`,
      {
        name,
        public: options.public ?? true,
        description: options.description ?? '',
      }
    );

    for (const ids of chunk(trackIds, ADD_TRACKS_BATCH_SIZE)) {
      await this.post(`${API_URL}/playlists/${encodeURIComponent(playlist.id)}/tracks`, {
        uris: ids.map(id => `spotify:track:${id}`),
      });
    }

    logger.info(`✅ Created playlist "${name}" (${playlist.id}) with ${trackIds.length} tracks`);
    return playlist.id;
  }

  private safeFeatureState(trackId: string, features: SpotifyAudioFeatures | null | undefined): FeatureState {
    try {
      return toFeatureState(features);
    } catch (error) {
      logger.warn(`Malformed audio features for ${trackId}: ${this.describe(error)}`);
      return ABSENT;
    }
  }

  private toSummary(playlist: SpotifyPlaylistObject): PlaylistSummary {
    return {
      id: playlist.id,
      name: playlist.name,
      ownerId: playlist.owner.id,
      trackCount: playlist.tracks.total,
    };
  }

  private async getAllPages<T>(firstUrl: string): Promise<T[]> {
    const items: T[] = [];
    let url: string | null = firstUrl;
    while (url) {
      const page: SpotifyPage<T> = await this.get<SpotifyPage<T>>(url);
      items.push(...page.items);
      url = page.next;
    }
    return items;
  }

  private ensureConfigured(): void {
    if (!this.isConfigured()) {
      throw new NotConfiguredError('Spotify API not configured');
    }
  }

  /**
   * Get Spotify access token. Uses the user's refresh token when we have one,
   * otherwise the Client Credentials Flow (public data only).
   */
  private async getAccessToken(): Promise<string> {
    this.ensureConfigured();

    // Return cached token if still valid
    if (this.accessToken && Date.now() < this.tokenExpiry) {
      return this.accessToken;
    }

    const token = this.refreshToken
      ? await this.requestToken({ grant_type: 'refresh_token', refresh_token: this.refreshToken })
      : await this.requestToken({ grant_type: 'client_credentials' });

    // Spotify may rotate the refresh token
    if (token.refresh_token) {
      this.refreshToken = token.refresh_token;
    }

    this.accessToken = token.access_token;
    this.tokenExpiry = Date.now() + token.expires_in * 1000 - 60000; // 1 min buffer

    logger.info('✅ Spotify access token obtained');
    return token.access_token;
  }

  private async requestToken(params: Record<string, string>): Promise<SpotifyTokenResponse> {
    this.ensureConfigured();
    const basic = Buffer.from(`${this.credentials.clientId}:${this.credentials.clientSecret}`).toString('base64');

    try {
      const response = await this.http.post<SpotifyTokenResponse>(
        `${ACCOUNTS_URL}/api/token`,
        new URLSearchParams(params).toString(),
        {
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Authorization: `Basic ${basic}`,
          },
        }
      );
      return response.data;
    } catch (error) {
      logger.error('Failed to get Spotify access token:', error);
      throw new SpotifyApiError('Failed to authenticate with Spotify', this.statusOf(error));
    }
  }

  private async get<T>(url: string, params?: Record<string, string>): Promise<T> {
    const token = await this.getAccessToken();
    try {
      const response = await this.http.get<T>(url, {
        params,
        headers: { Authorization: `Bearer ${token}` },
      });
      return response.data;
    } catch (error) {
      throw this.toApiError(error, `GET ${url}`);
    }
  }

  private async post<T>(url: string, body: unknown): Promise<T> {
    const token = await this.getAccessToken();
    try {
      const response = await this.http.post<T>(url, body, {
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
      });
      return response.data;
    } catch (error) {
      throw this.toApiError(error, `POST ${url}`);
    }
  }

  private toApiError(error: unknown, request: string): SpotifyApiError {
    const status = this.statusOf(error);
    if (status === 401) {
      // Force a fresh token on the next call
      this.accessToken = null;
    }
    return new SpotifyApiError(`Spotify request failed (${request}): ${this.describe(error)}`, status);
  }

  private statusOf(error: unknown): number | undefined {
    return axios.isAxiosError(error) ? error.response?.status : undefined;
  }

  private describe(error: unknown): string {
    if (axios.isAxiosError(error) && error.response) {
      return `HTTP ${error.response.status}`;
    }
    return error instanceof Error ? error.message : String(error);
  }
}

export { SpotifyService };

export default new SpotifyService();
