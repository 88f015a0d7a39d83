export type FlowErrorCode =
  | 'EMPTY_PLAYLIST'
  | 'DUPLICATE_TRACK'
  | 'UNKNOWN_TRACK'
  | 'INVALID_DIMENSION'
  | 'MISSING_FEATURES'
  | 'SPOTIFY_API_ERROR'
  | 'NOT_CONFIGURED'
  | 'INVALID_REQUEST';

/**
 * Base class for every failure the app raises on purpose.
 * `statusCode` is what the HTTP layer answers with.
 */
export class FlowError extends Error {
  readonly code: FlowErrorCode;
  readonly statusCode: number;

  constructor(code: FlowErrorCode, message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class EmptyPlaylistError extends FlowError {
  constructor(message = 'Playlist has no tracks') {
    super('EMPTY_PLAYLIST', message, 422);
  }
}

export class DuplicateTrackError extends FlowError {
  constructor(readonly trackId: string) {
    super('DUPLICATE_TRACK', `Track ${trackId} is already in the playlist`, 409);
  }
}

export class UnknownTrackError extends FlowError {
  constructor(readonly trackId: string) {
    super('UNKNOWN_TRACK', `Track ${trackId} is not in the playlist`, 404);
  }
}

export class InvalidDimensionError extends FlowError {
  constructor(message: string) {
    super('INVALID_DIMENSION', message, 422);
  }
}

export class MissingFeaturesError extends FlowError {
  constructor(readonly trackIds: string[]) {
    super('MISSING_FEATURES', `No audio features for track(s): ${trackIds.join(', ')}`, 422);
  }
}

export class SpotifyApiError extends FlowError {
  constructor(message: string, readonly upstreamStatus?: number) {
    super('SPOTIFY_API_ERROR', message, 502);
  }
}

export class NotConfiguredError extends FlowError {
  constructor(message: string) {
    super('NOT_CONFIGURED', message, 503);
  }
}

export class ValidationError extends FlowError {
  constructor(message: string) {
    super('INVALID_REQUEST', message, 400);
  }
}

export const isFlowError = (error: unknown): error is FlowError => error instanceof FlowError;
