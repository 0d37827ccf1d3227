import { Injectable } from '@nestjs/common';
import { StageInvariantError } from '../../common/errors';
import { speedKmh } from '../../geo/geodesy';
import { IStage, IStageSummary, StageType } from '../models';

const round = (value: number, decimals = 2): number =>
  Math.round(value * 10 ** decimals) / 10 ** decimals;

/**
 * Totales de un ride a partir de sus stages
 */
export function summariseStages(stages: readonly IStage[]): IStageSummary {
  if (stages.length === 0) {
    throw new StageInvariantError('Cannot summarise an empty stage list');
  }

  const first = stages[0];
  const last = stages[stages.length - 1];

  let distanceMetres = 0;
  let ascentMetres = 0;
  let descentMetres = 0;
  let controlSeconds = 0;
  let controlCount = 0;
  let maxSpeedKmh = 0;
  let minElevation: number | undefined;
  let maxElevation: number | undefined;

  for (const stage of stages) {
    distanceMetres += stage.distanceMetres;
    ascentMetres += stage.ascentMetres;
    descentMetres += stage.descentMetres;
    maxSpeedKmh = Math.max(maxSpeedKmh, stage.maxSpeedKmh);

    if (stage.type === StageType.CONTROL) {
      controlSeconds += stage.durationSeconds;
      controlCount++;
    }

    if (stage.minElevation !== undefined) {
      minElevation =
        minElevation === undefined ? stage.minElevation : Math.min(minElevation, stage.minElevation);
    }
    if (stage.maxElevation !== undefined) {
      maxElevation =
        maxElevation === undefined ? stage.maxElevation : Math.max(maxElevation, stage.maxElevation);
    }
  }

  const durationSeconds = (last.endTime.getTime() - first.startTime.getTime()) / 1000;
  const movingSeconds = durationSeconds - controlSeconds;

  return {
    startTime: first.startTime,
    endTime: last.endTime,
    durationSeconds,
    distanceMetres,
    movingSeconds,
    controlSeconds,
    movingPercent: durationSeconds > 0 ? round((movingSeconds / durationSeconds) * 100) : 100,
    controlPercent: durationSeconds > 0 ? round((controlSeconds / durationSeconds) * 100) : 0,
    averageMovingSpeedKmh: movingSeconds > 0 ? speedKmh(distanceMetres, movingSeconds) : 0,
    averageOverallSpeedKmh: durationSeconds > 0 ? speedKmh(distanceMetres, durationSeconds) : 0,
    ascentMetres,
    descentMetres,
    maxSpeedKmh,
    minElevation,
    maxElevation,
    stageCount: stages.length,
    controlCount,
  };
}

/**
 * Envoltorio inyectable de summariseStages
 */
@Injectable()
export class StageSummaryService {
  summarise(stages: readonly IStage[]): IStageSummary {
    return summariseStages(stages);
  }
}
