import express from 'express';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PlaylistModel } from '../models/playlist.model';
import { listen, type TestServer } from '../test/http';
import type { PlaylistSummary, ReorderRequest, ReorderResult } from '../types/flow.types';
import { MissingFeaturesError, SpotifyApiError } from '../utils/errors';
import { ABSENT, present } from '../utils/feature-vector';
import { PlaylistController } from './playlist.controller';

const playlists: PlaylistSummary[] = [{ id: 'p1', name: 'Road Trip', ownerId: 'user-1', trackCount: 2 }];

const result: ReorderResult = {
  playlistId: 'p1',
  name: 'Road Trip - Improved',
  order: ['a', 'b'],
  tracks: [],
  missingFeatureIds: [],
  cost: { original: 2, reordered: 1 },
};

describe('PlaylistController', () => {
  const getUserPlaylists = vi.fn(async (): Promise<PlaylistSummary[]> => playlists);
  const loadModel = vi.fn(async (): Promise<PlaylistModel> => {
    const model = new PlaylistModel();
    model.insert('a', { name: 'Alpha', artist: 'Ann' }, present([0, 0, 0, 0, 0, 0, 0]));
    model.insert('b', { name: 'Beta', artist: 'Bo' }, ABSENT);
    return model;
  });
  const reorder = vi.fn(async (_request: ReorderRequest): Promise<ReorderResult> => result);

  let server: TestServer;

  beforeEach(async () => {
    vi.clearAllMocks();
    const controller = new PlaylistController({ getUserPlaylists }, { loadModel, reorder });
    const app = express();
    app.use(express.json());
    app.get('/playlists', (req, res) => controller.getAll(req, res));
    app.get('/playlists/:id/tracks', (req, res) => controller.getTracks(req, res));
    app.post('/playlists/:id/reorder', (req, res) => controller.reorder(req, res));
    server = await listen(app);
  });

  afterEach(async () => {
    await server.close();
  });

  it('lists playlists', async () => {
    const res = await fetch(`${server.url}/playlists`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ playlists });
  });

  it('lists tracks with their feature state', async () => {
    const res = await fetch(`${server.url}/playlists/p1/tracks`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      playlistId: 'p1',
      tracks: [
        { id: 'a', name: 'Alpha', artist: 'Ann', hasFeatures: true },
        { id: 'b', name: 'Beta', artist: 'Bo', hasFeatures: false },
      ],
      missingFeatureIds: ['b'],
    });
  });

  it('reorders with the options from the body', async () => {
    const res = await fetch(`${server.url}/playlists/p1/reorder`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ seedId: 'b', missingFeatures: 'append' }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(result);
    expect(reorder).toHaveBeenCalledWith({
      playlistId: 'p1',
      seedId: 'b',
      missingFeatures: 'append',
      create: undefined,
      name: undefined,
      withGenres: undefined,
    });
  });

  it('answers 201 when a playlist was created', async () => {
    reorder.mockResolvedValueOnce({ ...result, createdPlaylistId: 'new-playlist' });

    const res = await fetch(`${server.url}/playlists/p1/reorder`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ create: true }),
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ createdPlaylistId: 'new-playlist' });
  });

  it('answers 400 for an invalid body', async () => {
    const res = await fetch(`${server.url}/playlists/p1/reorder`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ missingFeatures: 'zeros' }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'missingFeatures must be one of: append, reject',
      code: 'INVALID_REQUEST',
    });
    expect(reorder).not.toHaveBeenCalled();
  });

  it('names the tracks without features', async () => {
    reorder.mockRejectedValueOnce(new MissingFeaturesError(['b']));

    const res = await fetch(`${server.url}/playlists/p1/reorder`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ missingFeatures: 'reject' }),
    });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: 'No audio features for track(s): b',
      code: 'MISSING_FEATURES',
      trackIds: ['b'],
    });
  });

  it('answers 502 when Spotify fails', async () => {
    getUserPlaylists.mockRejectedValueOnce(new SpotifyApiError('Spotify request failed', 500));

    const res = await fetch(`${server.url}/playlists`);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'Spotify request failed', code: 'SPOTIFY_API_ERROR' });
  });

  it('answers 500 for unexpected errors', async () => {
    loadModel.mockRejectedValueOnce(new Error('boom'));

    const res = await fetch(`${server.url}/playlists/p1/tracks`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'boom' });
  });
});
