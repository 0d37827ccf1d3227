import { EmptyTrackError, TrackOrderError } from '../../common/errors';
import { BASE_TIME, buildTrack, northOf } from '../../testing/track.fixtures';
import { ITrack } from '../models';
import {
  assertValidTrack,
  createTrackPoint,
  enrichTrack,
  joinTracks,
} from './track.utils';

describe('track utils', () => {
  describe('createTrackPoint', () => {
    it('should round coordinates to 6 decimals and elevation to 1', () => {
      const point = createTrackPoint({
        lat: 51.12345678,
        lon: -0.987654321,
        ele: 123.456,
        time: '2024-06-01T10:00:00Z',
      });

      expect(point).toEqual({ lat: 51.123457, lon: -0.987654, ele: 123.5, time: BASE_TIME });
      expect(Object.isFrozen(point)).toBe(true);
    });

    it('should leave elevation out when the decoder has none', () => {
      const point = createTrackPoint({ lat: 1, lon: 2, ele: null, time: BASE_TIME });

      expect('ele' in point).toBe(false);
    });

    it('should accept Date timestamps', () => {
      const point = createTrackPoint({ lat: 1, lon: 2, time: new Date(BASE_TIME) });

      expect(point.time).toBe(BASE_TIME);
    });

    it('should reject an unparseable timestamp', () => {
      expect(() => createTrackPoint({ lat: 1, lon: 2, time: 'yesterday-ish' })).toThrow(
        TrackOrderError,
      );
    });

    it('should reject an epoch outside the Date range', () => {
      expect(() => createTrackPoint({ lat: 1, lon: 2, time: 9e15 })).toThrow(
        'Trackpoint has an invalid timestamp: 9000000000000000',
      );
    });
  });

  describe('assertValidTrack', () => {
    it('should reject an empty track', () => {
      expect(() => assertValidTrack({ name: 'empty', points: [] })).toThrow(EmptyTrackError);
    });

    it('should reject decreasing timestamps', () => {
      const track: ITrack = {
        points: [
          { lat: 1, lon: 1, time: BASE_TIME + 1000 },
          { lat: 1, lon: 1, time: BASE_TIME },
        ],
      };

      expect(() => assertValidTrack(track)).toThrow(TrackOrderError);
    });

    it('should report out-of-order timestamps beyond the Date range as a track order error', () => {
      const track: ITrack = {
        points: [
          { lat: 1, lon: 1, time: 9e15 },
          { lat: 1, lon: 1, time: 8.7e15 },
        ],
      };

      expect(() => assertValidTrack(track)).toThrow(
        new TrackOrderError('Timestamps decrease at point 1 (9000000000000000 ms > 8700000000000000 ms)'),
      );
    });

    it('should accept repeated timestamps', () => {
      const track: ITrack = {
        points: [
          { lat: 1, lon: 1, time: BASE_TIME },
          { lat: 1, lon: 1, time: BASE_TIME },
        ],
      };

      expect(() => assertValidTrack(track)).not.toThrow();
    });
  });

  describe('joinTracks', () => {
    const morning = buildTrack([0, 100, 200], { name: 'morning' });
    const afternoon = buildTrack([5000, 5100], {
      name: 'afternoon',
      startTime: BASE_TIME + 3_600_000,
    });

    it('should concatenate sources ordered by their first timestamp', () => {
      const joined = joinTracks([afternoon, morning]);

      expect(joined.name).toBe('morning');
      expect(joined.points).toHaveLength(5);
      expect(joined.points.map((p) => p.time)).toEqual([
        BASE_TIME,
        BASE_TIME + 10_000,
        BASE_TIME + 20_000,
        BASE_TIME + 3_600_000,
        BASE_TIME + 3_610_000,
      ]);
    });

    it('should keep the gap between sources without interpolating', () => {
      const joined = joinTracks([morning, afternoon]);

      expect(joined.points[2]).toBe(morning.points[2]);
      expect(joined.points[3]).toBe(afternoon.points[0]);
    });

    it('should reject overlapping sources', () => {
      const overlapping = buildTrack([0, 100], { startTime: BASE_TIME + 5_000 });

      expect(() => joinTracks([morning, overlapping])).toThrow(TrackOrderError);
    });

    it('should ignore empty sources and reject when nothing is left', () => {
      expect(joinTracks([{ points: [] }, morning]).points).toHaveLength(3);
      expect(() => joinTracks([{ points: [] }])).toThrow(EmptyTrackError);
    });
  });

  describe('enrichTrack', () => {
    it('should compute deltas, speed and running distance', () => {
      const enriched = enrichTrack(buildTrack([0, 100, 200]));

      expect(enriched[0]).toMatchObject({
        index: 0,
        deltaMetres: 0,
        deltaSeconds: 0,
        speedKmh: 0,
        runningMetres: 0,
      });
      expect(enriched[1].deltaMetres).toBeCloseTo(100, 0);
      expect(enriched[1].deltaSeconds).toBe(10);
      expect(enriched[1].speedKmh).toBeCloseTo(36, 1);
      expect(enriched[2].runningMetres).toBeCloseTo(200, 0);
    });

    it('should accumulate ascent and descent', () => {
      const enriched = enrichTrack(
        buildTrack([0, 100, 200], { elevations: [100, 110.5, 105] }),
      );

      expect(enriched[2].runningAscentMetres).toBe(10.5);
      expect(enriched[2].runningDescentMetres).toBe(5.5);
    });

    it('should not count climbs next to points without elevation', () => {
      const track: ITrack = {
        points: [
          { ...northOf(0), ele: 100, time: BASE_TIME },
          { ...northOf(100), time: BASE_TIME + 10_000 },
          { ...northOf(200), ele: 120, time: BASE_TIME + 20_000 },
        ],
      };

      const enriched = enrichTrack(track);

      expect(enriched[2].runningAscentMetres).toBe(0);
      expect(enriched[2].runningDescentMetres).toBe(0);
    });
  });
});
