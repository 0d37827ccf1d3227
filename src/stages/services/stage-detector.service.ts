import { Injectable, Logger } from '@nestjs/common';
import { EmptyTrackError, StageInvariantError } from '../../common/errors';
import { speedKmh } from '../../geo/geodesy';
import { GeocodingService } from '../../geocoding/services/geocoding.service';
import { IEnrichedTrackPoint, ITrack, ITrackPoint, enrichTrack } from '../../track';
import {
  DEFAULT_STAGE_PARAMETERS,
  IStage,
  IStageBoundary,
  IStageDetectionParameters,
  SegmentationState,
  StageType,
  initialSegmentationState,
} from '../models';
import { StateMachineService } from './state-machine.service';

/**
 * Segmenta un track en stages Moving / Control
 *
 * Recorre los puntos una sola vez alimentando la máquina de estados, luego
 * calcula las estadísticas de cada stage y le pone nombre con el gazetteer.
 */
@Injectable()
export class StageDetectorService {
  private readonly logger = new Logger(StageDetectorService.name);

  constructor(
    private readonly stateMachine: StateMachineService,
    private readonly geocoding: GeocodingService,
  ) {}

  detectStages(
    track: ITrack,
    params: IStageDetectionParameters = DEFAULT_STAGE_PARAMETERS,
  ): IStage[] {
    const points = track.points;
    if (points.length === 0) {
      throw new EmptyTrackError(track.name);
    }

    const boundaries = this.segment(points, params);
    this.assertCoverage(boundaries, points.length);

    const enriched = enrichTrack(track);
    const stages = boundaries.map((boundary) => this.buildStage(boundary, enriched));

    this.logger.debug(
      `Detected ${stages.length} stages (${stages.filter((s) => s.type === StageType.CONTROL).length} controls) in ${points.length} points`,
    );

    return stages;
  }

  /**
   * Fronteras de stage, sin estadísticas
   */
  segment(
    points: readonly ITrackPoint[],
    params: IStageDetectionParameters,
  ): IStageBoundary[] {
    const boundaries: IStageBoundary[] = [];
    let state: SegmentationState = initialSegmentationState();

    for (let index = 1; index < points.length; index++) {
      const transition = this.stateMachine.transition(state, points, index, params);
      state = transition.state;
      if (transition.boundary) {
        boundaries.push(transition.boundary);
      }
    }

    const last = this.stateMachine.finish(state, points.length - 1);
    if (last) {
      boundaries.push(last);
    }

    return boundaries;
  }

  private assertCoverage(boundaries: IStageBoundary[], pointCount: number): void {
    if (boundaries.length === 0) {
      throw new StageInvariantError('Segmentation produced no stages');
    }

    let expectedStart = 0;
    for (const boundary of boundaries) {
      if (boundary.startIndex !== expectedStart || boundary.endIndex < boundary.startIndex) {
        throw new StageInvariantError(
          `Stage [${boundary.startIndex}, ${boundary.endIndex}] does not start at ${expectedStart}`,
        );
      }
      expectedStart = boundary.endIndex + 1;
    }

    if (expectedStart !== pointCount) {
      throw new StageInvariantError(
        `Stages cover ${expectedStart} of ${pointCount} points`,
      );
    }
  }

  private buildStage(
    boundary: IStageBoundary,
    enriched: readonly IEnrichedTrackPoint[],
  ): IStage {
    const { startIndex, endIndex } = boundary;
    const first = enriched[startIndex];
    const end = enriched[endIndex];

    // El stage arranca donde terminó el anterior: así las sumas cuadran con el track
    const before = startIndex > 0 ? enriched[startIndex - 1] : first;

    const durationSeconds = (end.time - before.time) / 1000;
    const distanceMetres = end.runningMetres - before.runningMetres;

    let maxSpeedKmh = 0;
    let minElevation: number | undefined;
    let maxElevation: number | undefined;

    for (let i = startIndex; i <= endIndex; i++) {
      const point = enriched[i];
      if (Number.isFinite(point.speedKmh) && point.speedKmh > maxSpeedKmh) {
        maxSpeedKmh = point.speedKmh;
      }
      if (point.ele !== undefined) {
        minElevation = minElevation === undefined ? point.ele : Math.min(minElevation, point.ele);
        maxElevation = maxElevation === undefined ? point.ele : Math.max(maxElevation, point.ele);
      }
    }

    const stage: IStage = {
      type: boundary.type,
      startIndex,
      endIndex,
      start: this.toPoint(first),
      end: this.toPoint(end),
      anchorIndex: boundary.anchorIndex,
      startTime: new Date(before.time),
      endTime: new Date(end.time),
      durationSeconds,
      distanceMetres,
      ascentMetres: end.runningAscentMetres - before.runningAscentMetres,
      descentMetres: end.runningDescentMetres - before.runningDescentMetres,
      averageSpeedKmh: durationSeconds > 0 ? speedKmh(distanceMetres, durationSeconds) : 0,
      maxSpeedKmh,
      minElevation,
      maxElevation,
      runningMetres: end.runningMetres,
      runningSeconds: (end.time - enriched[0].time) / 1000,
    };

    return { ...stage, ...this.describeStage(stage, enriched) };
  }

  private describeStage(
    stage: IStage,
    enriched: readonly IEnrichedTrackPoint[],
  ): Pick<IStage, 'startPlace' | 'endPlace' | 'anchorPlace' | 'description'> {
    const startPlace = this.geocoding.describe(stage.start.lat, stage.start.lon);

    if (stage.type === StageType.CONTROL) {
      const anchor = enriched[stage.anchorIndex ?? stage.startIndex];
      const anchorPlace = this.geocoding.describe(anchor.lat, anchor.lon);
      return { startPlace, anchorPlace, description: anchorPlace ?? startPlace };
    }

    const endPlace = this.geocoding.describe(stage.end.lat, stage.end.lon);
    const description = startPlace && endPlace ? `${startPlace} to ${endPlace}` : undefined;

    return { startPlace, endPlace, description };
  }

  private toPoint(point: IEnrichedTrackPoint): ITrackPoint {
    return point.ele === undefined
      ? { lat: point.lat, lon: point.lon, time: point.time }
      : { lat: point.lat, lon: point.lon, ele: point.ele, time: point.time };
  }
}
