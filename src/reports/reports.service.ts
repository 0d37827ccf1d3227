import { Injectable, Logger } from '@nestjs/common';
import { RideRepository } from '../database/repositories/ride.repository';
import { RideStageRepository } from '../database/repositories/ride-stage.repository';
import { Ride } from '../database/entities/ride.entity';
import { RideStage } from '../database/entities/ride-stage.entity';
import { StageType } from '../stages/models/stage.model';
import { QueryReportsDto, RideResponseDto, StageResponseDto } from './dto';

/**
 * Servicio de reportes históricos de rides
 */
@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(
    private readonly rideRepository: RideRepository,
    private readonly rideStageRepository: RideStageRepository,
  ) {}

  /**
   * Obtener rides históricos
   * GET /api/reports/rides
   */
  async getRides(query: QueryReportsDto): Promise<RideResponseDto[]> {
    const { from, to, limit } = query;

    this.logger.debug(`Getting rides: from=${from}, to=${to}, limit=${limit ?? 'none'}`);

    const rides = await this.rideRepository.findByTimeRange(
      new Date(from),
      new Date(to),
      limit,
    );

    this.logger.debug(`Found ${rides.length} rides`);

    return rides.map((ride) => this.mapRideToDto(ride));
  }

  /**
   * Obtener un ride con sus stages
   * GET /api/reports/rides/:rideId
   *
   * @returns null si el ride no existe
   */
  async getRide(rideId: string): Promise<RideResponseDto | null> {
    const ride = await this.rideRepository.findById(rideId);
    if (!ride) {
      return null;
    }

    const stages = await this.rideStageRepository.findByRide(rideId);

    return {
      ...this.mapRideToDto(ride),
      stages: stages.map((stage) => this.mapStageToDto(stage)),
    };
  }

  /**
   * Obtener los stages de un ride, opcionalmente filtrados por tipo
   * GET /api/reports/rides/:rideId/stages
   *
   * @returns null si el ride no existe
   */
  async getStages(rideId: string, type?: StageType): Promise<StageResponseDto[] | null> {
    const ride = await this.rideRepository.findById(rideId);
    if (!ride) {
      return null;
    }

    const stages = await this.rideStageRepository.findByRide(rideId, type);
    return stages.map((stage) => this.mapStageToDto(stage));
  }

  /**
   * Borrar un ride y sus stages
   * DELETE /api/reports/rides/:rideId
   */
  async deleteRide(rideId: string): Promise<boolean> {
    const deleted = await this.rideRepository.deleteById(rideId);
    if (deleted) {
      this.logger.log(`Ride ${rideId} deleted`);
    }
    return deleted;
  }

  /**
   * Mapear entidad Ride a DTO
   */
  private mapRideToDto(ride: Ride): RideResponseDto {
    const { summary } = ride;

    return {
      id: ride.id,
      name: ride.name ?? undefined,
      startTime: ride.start_time.toISOString(),
      endTime: ride.end_time.toISOString(),
      distance: ride.distance,
      duration: ride.duration,
      movingSeconds: summary.movingSeconds,
      controlSeconds: summary.controlSeconds,
      averageMovingSpeed: summary.averageMovingSpeedKmh,
      averageSpeed: summary.averageOverallSpeedKmh,
      maxSpeed: summary.maxSpeedKmh,
      ascent: summary.ascentMetres,
      descent: summary.descentMetres,
      controlCount: ride.control_count,
      originalPointCount: ride.original_point_count,
      analysedPointCount: ride.analysed_point_count,
      toleranceMetres: ride.tolerance_metres ?? undefined,
    };
  }

  /**
   * Mapear entidad RideStage a DTO
   */
  private mapStageToDto(stage: RideStage): StageResponseDto {
    return {
      sequence: stage.sequence,
      type: stage.stage_type,
      startIndex: stage.start_index,
      endIndex: stage.end_index,
      startTime: stage.start_time.toISOString(),
      endTime: stage.end_time.toISOString(),
      duration: stage.duration,
      distance: stage.distance,
      ascent: stage.ascent,
      descent: stage.descent,
      averageSpeed: stage.avg_speed,
      maxSpeed: stage.max_speed,
      startLat: stage.start_lat,
      startLon: stage.start_lon,
      endLat: stage.end_lat,
      endLon: stage.end_lon,
      startPlace: stage.start_place ?? undefined,
      endPlace: stage.end_place ?? undefined,
      anchorPlace: stage.anchor_place ?? undefined,
      description: stage.description ?? undefined,
    };
  }
}
