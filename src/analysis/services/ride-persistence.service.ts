import { Injectable, Logger } from '@nestjs/common';
import { errorMessage, errorStack } from '../../common/errors';
import {
  ICreateRideStageData,
  RideRepository,
} from '../../database/repositories/ride.repository';
import { IStage } from '../../stages';
import { IRideAnalysis } from '../models';

/**
 * Persiste el resultado de un análisis en PostgreSQL
 *
 * Un fallo de la base de datos no invalida el análisis: se registra y el
 * resultado se devuelve igual, marcado como no persistido.
 */
@Injectable()
export class RidePersistenceService {
  private readonly logger = new Logger(RidePersistenceService.name);

  constructor(private readonly rideRepository: RideRepository) {}

  async persist(analysis: Omit<IRideAnalysis, 'persisted'>): Promise<boolean> {
    const { summary } = analysis;

    try {
      await this.rideRepository.saveAnalysis(
        {
          id: analysis.id,
          name: analysis.name ?? null,
          start_time: summary.startTime,
          end_time: summary.endTime,
          original_point_count: analysis.originalPointCount,
          analysed_point_count: analysis.analysedPointCount,
          tolerance_metres: analysis.toleranceMetres ?? null,
          distance: summary.distanceMetres,
          duration: Math.round(summary.durationSeconds),
          control_count: summary.controlCount,
          parameters: analysis.parameters,
          summary: {
            ...summary,
            startTime: summary.startTime.toISOString(),
            endTime: summary.endTime.toISOString(),
          },
        },
        analysis.stages.map((stage, sequence) => this.toStageData(stage, sequence)),
      );

      this.logger.log(
        `Ride ${analysis.id} persisted with ${analysis.stages.length} stages`,
      );
      return true;
    } catch (error) {
      this.logger.error(
        `Error persisting ride ${analysis.id}: ${errorMessage(error)}`,
        errorStack(error),
      );
      return false;
    }
  }

  private toStageData(stage: IStage, sequence: number): ICreateRideStageData {
    return {
      sequence,
      stage_type: stage.type,
      start_index: stage.startIndex,
      end_index: stage.endIndex,
      start_time: stage.startTime,
      end_time: stage.endTime,
      duration: Math.round(stage.durationSeconds),
      distance: stage.distanceMetres,
      ascent: stage.ascentMetres,
      descent: stage.descentMetres,
      avg_speed: stage.averageSpeedKmh,
      max_speed: stage.maxSpeedKmh,
      start_lat: stage.start.lat,
      start_lon: stage.start.lon,
      end_lat: stage.end.lat,
      end_lon: stage.end.lon,
      start_place: stage.startPlace ?? null,
      end_place: stage.endPlace ?? null,
      anchor_place: stage.anchorPlace ?? null,
      description: stage.description ?? null,
    };
  }
}
