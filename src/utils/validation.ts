import type { MissingFeaturesPolicy, ReorderRequest } from '../types/flow.types';
import { ValidationError } from './errors';

export type ReorderOptions = Omit<ReorderRequest, 'playlistId' | 'onProgress'>;

const POLICIES: readonly MissingFeaturesPolicy[] = ['append', 'reject'];

const isPolicy = (value: unknown): value is MissingFeaturesPolicy =>
  POLICIES.some(policy => policy === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${key} must be a non-empty string`);
  }
  return value.trim();
}

function optionalBoolean(body: Record<string, unknown>, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${key} must be true or false`);
  }
  return value;
}

function optionalPolicy(value: unknown): MissingFeaturesPolicy | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isPolicy(value)) {
    throw new ValidationError(`missingFeatures must be one of: ${POLICIES.join(', ')}`);
  }
  return value;
}

export function parsePlaylistId(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('Playlist id is required');
  }
  return value.trim();
}

/**
 * Read reorder options from a request body. A missing body means defaults.
 */
export function parseReorderOptions(body: unknown): ReorderOptions {
  if (body === undefined || body === null) {
    return {};
  }
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be an object');
  }

  return {
    seedId: optionalString(body, 'seedId'),
    missingFeatures: optionalPolicy(body.missingFeatures),
    create: optionalBoolean(body, 'create'),
    name: optionalString(body, 'name'),
    withGenres: optionalBoolean(body, 'withGenres'),
  };
}
