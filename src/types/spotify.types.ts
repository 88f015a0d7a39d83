// Shapes of the Spotify Web API payloads we read. Only the fields in use are listed.

export interface SpotifyAudioFeatures {
  id: string;
  danceability: number;      // 0.0 - 1.0
  energy: number;            // 0.0 - 1.0
  key: number;               // 0 - 11 (C, C#, D, ...)
  loudness: number;          // dB
  mode: number;              // 0 = minor, 1 = major
  speechiness: number;       // 0.0 - 1.0
  acousticness: number;      // 0.0 - 1.0
  instrumentalness: number;  // 0.0 - 1.0
  liveness: number;          // 0.0 - 1.0
  valence: number;           // 0.0 - 1.0 (happiness)
  tempo: number;             // BPM
  duration_ms: number;
  time_signature: number;
}

export interface SpotifyPage<T> {
  items: T[];
  next: string | null;
  total: number;
}

export interface SpotifyArtist {
  id: string | null;
  name: string;
}

export interface SpotifyTrackObject {
  id: string | null;
  name: string;
  artists: SpotifyArtist[];
  is_local?: boolean;
}

export interface SpotifyPlaylistItem {
  track: SpotifyTrackObject | null;
}

export interface SpotifyPlaylistObject {
  id: string;
  name: string;
  owner: { id: string; display_name?: string | null };
  tracks: { total: number };
}

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
}
