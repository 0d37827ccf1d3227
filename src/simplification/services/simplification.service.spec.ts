import { Test } from '@nestjs/testing';
import { EmptyTrackError, InvalidToleranceError } from '../../common/errors';
import { distanceToSegment } from '../../geo/geodesy';
import { buildTrack } from '../../testing/track.fixtures';
import { ITrack, ITrackPoint } from '../../track';
import { SimplificationService } from './simplification.service';

const point = (lat: number, lon: number, second: number): ITrackPoint => ({
  lat,
  lon,
  time: Date.UTC(2024, 5, 1) + second * 1000,
});

// Zigzag sobre el ecuador: p1 a ~56 m de la cuerda, p3 a ~1 m
const zigzag: ITrack = {
  name: 'zigzag',
  points: [
    point(0, 0, 0),
    point(0.0005, 0.001, 10),
    point(0, 0.002, 20),
    point(-0.00001, 0.003, 30),
    point(0, 0.004, 40),
  ],
};

const withinTolerance = (original: ITrack, simplified: ITrack, tolerance: number): boolean =>
  original.points.every((p) => {
    let best = Number.POSITIVE_INFINITY;
    for (let i = 1; i < simplified.points.length; i++) {
      best = Math.min(
        best,
        distanceToSegment(p, simplified.points[i - 1], simplified.points[i]),
      );
    }
    return best <= tolerance;
  });

describe('SimplificationService', () => {
  let service: SimplificationService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [SimplificationService],
    }).compile();

    service = moduleRef.get(SimplificationService);
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])(
    'should reject a tolerance of %p',
    (tolerance) => {
      expect(() => service.simplify(zigzag, tolerance)).toThrow(InvalidToleranceError);
    },
  );

  it('should reject an empty track', () => {
    expect(() => service.simplify({ points: [] }, 5)).toThrow(EmptyTrackError);
  });

  it('should return tracks with fewer than 3 points unchanged', () => {
    const pair = buildTrack([0, 100]);

    expect(service.simplify(pair, 5)).toBe(pair);
  });

  it('should reduce three collinear points to the endpoints', () => {
    const line = buildTrack([0, 100, 200]);

    const simplified = service.simplify(line, 1);

    expect(simplified.points).toEqual([line.points[0], line.points[2]]);
  });

  it('should keep the points that deviate more than the tolerance', () => {
    const simplified = service.simplify(zigzag, 10);

    expect(simplified.name).toBe('zigzag');
    expect(simplified.points).toEqual([
      zigzag.points[0],
      zigzag.points[1],
      zigzag.points[2],
      zigzag.points[4],
    ]);
  });

  it('should keep every input point within the tolerance of the result', () => {
    for (const tolerance of [0.5, 10, 30, 100]) {
      const simplified = service.simplify(zigzag, tolerance);

      expect(withinTolerance(zigzag, simplified, tolerance)).toBe(true);
      expect(simplified.points[0]).toBe(zigzag.points[0]);
      expect(simplified.points[simplified.points.length - 1]).toBe(zigzag.points[4]);
    }
  });

  it('should be idempotent under the same tolerance', () => {
    const once = service.simplify(zigzag, 10);
    const twice = service.simplify(once, 10);

    expect(twice.points).toEqual(once.points);
  });

  it('should handle long tracks without recursion', () => {
    // 50 km en línea recta a 1 m por punto
    const offsets = Array.from({ length: 50_000 }, (_, i) => i);
    const long = buildTrack(offsets, { stepSeconds: 1 });

    expect(service.simplify(long, 1).points).toHaveLength(2);
  });

  it('should report the reduction', () => {
    const result = service.simplifyWithReport(zigzag, 10);

    expect(result.originalCount).toBe(5);
    expect(result.simplifiedCount).toBe(4);
    expect(result.track.points).toHaveLength(4);
  });
});
