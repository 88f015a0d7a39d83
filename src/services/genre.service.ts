import axios from 'axios';
import config from '../config/environment';
import logger from '../utils/logger';
import type { GenreTagger } from '../types/flow.types';
import type { HttpClient } from './spotify.service';

const LASTFM_API_URL = 'https://ws.audioscrobbler.com/2.0/';

/** Closed vocabulary. Order matters: the first label that matches wins. */
export const GENRE_LABELS = [
  'electronic',
  'jazz',
  'hip hop',
  'pop',
  'rock',
  'alternative rock',
  'metal',
  'indie',
] as const;

export type GenreLabel = (typeof GENRE_LABELS)[number];

interface LastfmTag {
  name: string;
}

interface LastfmTrackInfoResponse {
  track?: {
    toptags?: {
      // a single tag comes back as an object rather than a one-element array
      tag?: LastfmTag[] | LastfmTag;
    };
  };
  error?: number;
  message?: string;
}

/**
 * Map free-text tags onto GENRE_LABELS. A tag matches a label when either
 * contains the other, case-insensitively. Tags are tried in order, labels in
 * GENRE_LABELS order.
 */
export function matchGenre(tags: readonly string[]): GenreLabel | null {
  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (tag.length === 0) continue;

    const label = GENRE_LABELS.find(genre => genre.includes(tag) || tag.includes(genre));
    if (label) {
      return label;
    }
  }
  return null;
}

/**
 * Genre lookup through Last.fm track tags.
 * Not part of ordering; used when a reorder request asks for genres.
 */
class GenreService implements GenreTagger {
  constructor(
    private readonly apiKey: string = config.lastfm.apiKey,
    private readonly http: HttpClient = axios
  ) {}

  isConfigured(): boolean {
    return this.apiKey !== '';
  }

  async getTags(trackName: string, artistName: string): Promise<string[]> {
    const response = await this.http.get<LastfmTrackInfoResponse>(LASTFM_API_URL, {
      params: {
        method: 'track.getInfo',
        api_key: this.apiKey,
        artist: artistName,
        track: trackName,
        format: 'json',
      },
    });

    const tag = response.data.track?.toptags?.tag;
    if (!tag) {
      return [];
    }
    return (Array.isArray(tag) ? tag : [tag]).map(t => t.name);
  }

  /**
   * @returns matching label, or null when nothing matches or the lookup fails
   */
  async lookupGenre(trackName: string, artistName: string): Promise<string | null> {
    if (!this.isConfigured()) {
      return null;
    }

    try {
      const tags = await this.getTags(trackName, artistName);
      return matchGenre(tags);
    } catch (error) {
      logger.warn(`Genre lookup failed for "${trackName}" by ${artistName}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}

export { GenreService };

export default new GenreService();
