import { describe, expect, it } from 'vitest';
import { PlaylistModel } from '../models/playlist.model';
import { EmptyPlaylistError, InvalidDimensionError, MissingFeaturesError, UnknownTrackError } from '../utils/errors';
import { ABSENT, type FeatureState, present } from '../utils/feature-vector';
import tourService from './tour.service';

const vec = (...head: number[]): FeatureState =>
  present([...head, ...Array<number>(7 - head.length).fill(0)]);

function modelOf(tracks: Array<[string, FeatureState]>): PlaylistModel {
  const model = new PlaylistModel();
  for (const [id, features] of tracks) {
    model.insert(id, { name: `Track ${id}`, artist: 'Someone' }, features);
  }
  return model;
}

describe('TourService.build', () => {
  it('walks to the nearest neighbour each step', () => {
    const model = modelOf([
      ['A', vec(0)],
      ['B', vec(1)],
      ['C', vec(5)],
    ]);

    expect(tourService.buildTour(model)).toEqual(['A', 'B', 'C']);
  });

  it('reorders when playlist order is not the nearest path', () => {
    const model = modelOf([
      ['A', vec(0)],
      ['far', vec(10)],
      ['near', vec(1)],
      ['mid', vec(4)],
    ]);

    expect(tourService.buildTour(model)).toEqual(['A', 'near', 'mid', 'far']);
  });

  it('starts from an explicit seed', () => {
    const model = modelOf([
      ['A', vec(0)],
      ['B', vec(1)],
      ['C', vec(5)],
    ]);

    // from C: B is 4 away, A is 5 away
    expect(tourService.build(model, { seedId: 'C' })).toEqual({ tour: ['C', 'B', 'A'], seedId: 'C', iterations: 2 });
  });

  it('breaks ties in favour of the earlier track', () => {
    const model = modelOf([
      ['seed', vec(0)],
      ['twin-1', vec(2, 2)],
      ['twin-2', vec(2, 2)],
    ]);

    expect(tourService.buildTour(model)).toEqual(['seed', 'twin-1', 'twin-2']);
  });

  it('breaks equidistant ties on opposite sides by insertion order', () => {
    const model = modelOf([
      ['seed', vec(0)],
      ['right', vec(3)],
      ['left', vec(-3)],
    ]);

    expect(tourService.buildTour(model)).toEqual(['seed', 'right', 'left']);
  });

  it('returns the single track of a one-track playlist without iterating', () => {
    const model = modelOf([['solo', vec(0.4, 0.2)]]);

    expect(tourService.build(model)).toEqual({ tour: ['solo'], seedId: 'solo', iterations: 0 });
  });

  it('runs n - 1 iterations', () => {
    const model = modelOf([
      ['a', vec(0)],
      ['b', vec(3)],
      ['c', vec(1)],
      ['d', vec(7)],
      ['e', vec(2)],
    ]);

    const build = tourService.build(model);
    expect(build.iterations).toBe(4);
    expect(build.tour).toEqual(['a', 'c', 'e', 'b', 'd']);
  });

  it('produces a permutation of the playlist ids', () => {
    const tracks: Array<[string, FeatureState]> = Array.from({ length: 25 }, (_, i) => [
      `t${i}`,
      vec((i * 7) % 11, (i * 3) % 5, i % 2),
    ]);
    const model = modelOf(tracks);

    const tour = tourService.buildTour(model);
    expect(tour).toHaveLength(25);
    expect(new Set(tour)).toEqual(model.ids());
  });

  it('is deterministic for the same input', () => {
    const tracks: Array<[string, FeatureState]> = Array.from({ length: 12 }, (_, i) => [`t${i}`, vec(i % 3, i % 4)]);

    expect(tourService.buildTour(modelOf(tracks))).toEqual(tourService.buildTour(modelOf(tracks)));
  });

  describe('tracks without features', () => {
    const withAbsent = () =>
      modelOf([
        ['A', vec(0)],
        ['D', ABSENT],
        ['B', vec(1)],
        ['C', vec(5)],
      ]);

    it('appends them at the end by default', () => {
      expect(tourService.buildTour(withAbsent())).toEqual(['A', 'B', 'C', 'D']);
    });

    it('keeps them in insertion order', () => {
      const model = modelOf([
        ['X', ABSENT],
        ['A', vec(0)],
        ['Y', ABSENT],
        ['B', vec(1)],
      ]);

      // seed skips past X to the first track with features
      expect(tourService.build(model)).toEqual({ tour: ['A', 'B', 'X', 'Y'], seedId: 'A', iterations: 1 });
    });

    it('rejects the build under the reject policy, naming every track', () => {
      const model = modelOf([
        ['A', vec(0)],
        ['D', ABSENT],
        ['E', ABSENT],
      ]);

      expect(() => tourService.build(model, { missingFeatures: 'reject' })).toThrow(MissingFeaturesError);
      try {
        tourService.build(model, { missingFeatures: 'reject' });
      } catch (error) {
        expect(error).toBeInstanceOf(MissingFeaturesError);
        expect(error instanceof MissingFeaturesError && error.trackIds).toEqual(['D', 'E']);
      }
    });

    it('keeps playlist order when no track has features', () => {
      const model = modelOf([
        ['X', ABSENT],
        ['Y', ABSENT],
      ]);

      expect(tourService.build(model)).toEqual({ tour: ['X', 'Y'], seedId: null, iterations: 0 });
    });

    it('refuses a seed without features', () => {
      expect(() => tourService.build(withAbsent(), { seedId: 'D' })).toThrow(MissingFeaturesError);
    });
  });

  it('refuses an unknown seed', () => {
    const model = modelOf([['A', vec(0)]]);
    expect(() => tourService.build(model, { seedId: 'missing' })).toThrow(UnknownTrackError);
  });

  it('lets a vector of the wrong length fail the build', () => {
    const model = modelOf([
      ['A', vec(0)],
      ['short', { kind: 'present', vector: [1] }],
    ]);

    expect(() => tourService.build(model)).toThrow(InvalidDimensionError);
  });

  it('returns an empty tour for an empty playlist by default', () => {
    expect(tourService.build(new PlaylistModel())).toEqual({ tour: [], seedId: null, iterations: 0 });
  });

  it('throws EmptyPlaylist for an empty playlist when empty tours are not allowed', () => {
    expect(() => tourService.build(new PlaylistModel(), { allowEmpty: false })).toThrow(EmptyPlaylistError);
  });
});

describe('TourService.tourCost', () => {
  it('sums neighbour distances and skips pairs without features', () => {
    const model = modelOf([
      ['A', vec(0)],
      ['C', vec(5)],
      ['B', vec(1)],
      ['D', ABSENT],
    ]);

    expect(tourService.tourCost(model, model.orderedIds())).toBe(9);
    expect(tourService.tourCost(model, tourService.buildTour(model))).toBe(5);
  });
});
