import { describe, expect, it } from 'vitest';
import { PlaylistModel } from './playlist.model';
import { DuplicateTrackError, EmptyPlaylistError, UnknownTrackError } from '../utils/errors';
import { ABSENT, present } from '../utils/feature-vector';

const vec = (x: number) => present([x, 0, 0, 0, 0, 0, 0]);

describe('PlaylistModel', () => {
  it('keeps insertion order and looks tracks up by id', () => {
    const model = new PlaylistModel();
    model.insert('b', { name: 'Second', artist: 'Artist B' }, vec(1));
    model.insert('a', { name: 'First', artist: 'Artist A' }, ABSENT);

    expect(model.size).toBe(2);
    expect(model.orderedIds()).toEqual(['b', 'a']);
    expect(model.firstInserted()).toBe('b');
    expect(model.get('a')).toEqual({ metadata: { name: 'First', artist: 'Artist A' }, features: ABSENT });
    expect(model.has('a')).toBe(true);
    expect(model.has('c')).toBe(false);
  });

  it('does not let a loaded track be changed', () => {
    const model = new PlaylistModel();
    model.insert('a', { name: 'First', artist: 'Artist A' }, vec(1));
    const entry = model.get('a');

    expect(Reflect.set(entry, 'features', ABSENT)).toBe(false);
    expect(Reflect.set(entry.metadata, 'name', 'Renamed')).toBe(false);
    expect(model.get('a')).toEqual({ metadata: { name: 'First', artist: 'Artist A' }, features: vec(1) });
    expect(model.missingFeatureIds()).toEqual([]);
  });

  it('returns the id set', () => {
    const model = new PlaylistModel();
    model.insert('x', { name: 'X', artist: 'A' }, vec(0));
    model.insert('y', { name: 'Y', artist: 'A' }, vec(0));

    expect(model.ids()).toEqual(new Set(['x', 'y']));
  });

  it('rejects a duplicate id', () => {
    const model = new PlaylistModel();
    model.insert('x', { name: 'X', artist: 'A' }, vec(0));

    expect(() => model.insert('x', { name: 'X again', artist: 'A' }, vec(1))).toThrow(DuplicateTrackError);
    expect(model.size).toBe(1);
    expect(model.get('x').metadata.name).toBe('X');
  });

  it('throws UnknownTrack for a missing id', () => {
    const model = new PlaylistModel();
    expect(() => model.get('nope')).toThrow(UnknownTrackError);
  });

  it('throws EmptyPlaylist when asking an empty model for its first track', () => {
    expect(() => new PlaylistModel().firstInserted()).toThrow(EmptyPlaylistError);
  });

  it('lists tracks without features in insertion order', () => {
    const model = new PlaylistModel();
    model.insert('a', { name: 'A', artist: 'A' }, ABSENT);
    model.insert('b', { name: 'B', artist: 'B' }, vec(1));
    model.insert('c', { name: 'C', artist: 'C' }, ABSENT);

    expect(model.missingFeatureIds()).toEqual(['a', 'c']);
  });

  it('does not expose its internal order', () => {
    const model = new PlaylistModel();
    model.insert('a', { name: 'A', artist: 'A' }, vec(0));

    const ids = [...model.orderedIds()];
    ids.push('b');
    expect(model.orderedIds()).toEqual(['a']);
  });
});
