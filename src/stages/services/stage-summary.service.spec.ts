import { StageInvariantError } from '../../common/errors';
import { BASE_TIME, northOf } from '../../testing/track.fixtures';
import { IStage, StageType } from '../models';
import { StageSummaryService, summariseStages } from './stage-summary.service';

const stage = (
  type: StageType,
  fromSecond: number,
  toSecond: number,
  overrides: Partial<IStage> = {},
): IStage => ({
  type,
  startIndex: 0,
  endIndex: 0,
  start: { ...northOf(0), time: BASE_TIME + fromSecond * 1000 },
  end: { ...northOf(0), time: BASE_TIME + toSecond * 1000 },
  startTime: new Date(BASE_TIME + fromSecond * 1000),
  endTime: new Date(BASE_TIME + toSecond * 1000),
  durationSeconds: toSecond - fromSecond,
  distanceMetres: 0,
  ascentMetres: 0,
  descentMetres: 0,
  averageSpeedKmh: 0,
  maxSpeedKmh: 0,
  runningMetres: 0,
  runningSeconds: toSecond,
  ...overrides,
});

describe('summariseStages', () => {
  const stages: IStage[] = [
    stage(StageType.MOVING, 0, 90, {
      distanceMetres: 900,
      ascentMetres: 10,
      maxSpeedKmh: 40,
      minElevation: 100,
      maxElevation: 110,
    }),
    stage(StageType.CONTROL, 90, 310, { distanceMetres: 300, descentMetres: 2, maxSpeedKmh: 5 }),
    stage(StageType.MOVING, 310, 390, {
      distanceMetres: 1200,
      ascentMetres: 5,
      descentMetres: 20,
      maxSpeedKmh: 60,
      minElevation: 90,
      maxElevation: 115,
    }),
  ];

  it('should add up the stages', () => {
    expect(summariseStages(stages)).toEqual({
      startTime: new Date(BASE_TIME),
      endTime: new Date(BASE_TIME + 390_000),
      durationSeconds: 390,
      distanceMetres: 2400,
      movingSeconds: 170,
      controlSeconds: 220,
      movingPercent: 43.59,
      controlPercent: 56.41,
      averageMovingSpeedKmh: (2400 / 170) * 3.6,
      averageOverallSpeedKmh: (2400 / 390) * 3.6,
      ascentMetres: 15,
      descentMetres: 22,
      maxSpeedKmh: 60,
      minElevation: 90,
      maxElevation: 115,
      stageCount: 3,
      controlCount: 1,
    });
  });

  it('should split the total duration between moving and control time', () => {
    const summary = summariseStages(stages);

    expect(summary.movingSeconds + summary.controlSeconds).toBe(summary.durationSeconds);
  });

  it('should not divide by zero for an instantaneous ride', () => {
    const summary = summariseStages([stage(StageType.MOVING, 0, 0)]);

    expect(summary).toMatchObject({
      durationSeconds: 0,
      movingPercent: 100,
      controlPercent: 0,
      averageMovingSpeedKmh: 0,
      averageOverallSpeedKmh: 0,
    });
    expect(summary.minElevation).toBeUndefined();
  });

  it('should reject an empty stage list', () => {
    expect(() => summariseStages([])).toThrow(StageInvariantError);
  });

  it('should be exposed as an injectable service', () => {
    expect(new StageSummaryService().summarise(stages).stageCount).toBe(3);
  });
});
