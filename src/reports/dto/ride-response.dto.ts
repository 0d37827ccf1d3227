import { StageResponseDto } from './stage-response.dto';

/**
 * DTO de respuesta para rides
 */
export class RideResponseDto {
  id!: string;

  name?: string;

  /**
   * Timestamps ISO 8601
   */
  startTime!: string;
  endTime!: string;

  /**
   * Distancia total (metros)
   */
  distance!: number;

  /**
   * Duración total en segundos
   */
  duration!: number;

  movingSeconds!: number;
  controlSeconds!: number;

  /**
   * Velocidades promedio (km/h)
   */
  averageMovingSpeed!: number;
  averageSpeed!: number;
  maxSpeed!: number;

  ascent!: number;
  descent!: number;

  controlCount!: number;

  originalPointCount!: number;
  analysedPointCount!: number;

  /**
   * Tolerancia usada al simplificar (sin valor si no se simplificó)
   */
  toleranceMetres?: number;

  /**
   * Solo en GET /api/reports/rides/:rideId
   */
  stages?: StageResponseDto[];
}
