import {
  DEFAULT_CONTROL_RESUMPTION_METRES,
  DEFAULT_CONTROL_SPEED_KMH,
  DEFAULT_MIN_CONTROL_SECONDS,
} from '../../env';
import { ITrackPoint } from '../../track';

/**
 * Tipo de stage
 */
export enum StageType {
  /**
   * En movimiento
   */
  MOVING = 'Moving',

  /**
   * Parada (control, comida, descanso)
   */
  CONTROL = 'Control',
}

/**
 * Parámetros del algoritmo de detección de stages
 */
export interface IStageDetectionParameters {
  // Por debajo de esta velocidad se abre un candidato a control (km/h)
  controlSpeedKmh: number;

  // Duración mínima a baja velocidad para confirmar un control (segundos)
  minControlSeconds: number;

  // Distancia desde el ancla que da por terminado un control (metros)
  controlResumptionMetres: number;
}

/**
 * Parámetros por defecto (configurables por env)
 */
export const DEFAULT_STAGE_PARAMETERS: IStageDetectionParameters = {
  controlSpeedKmh: DEFAULT_CONTROL_SPEED_KMH,
  minControlSeconds: DEFAULT_MIN_CONTROL_SECONDS,
  controlResumptionMetres: DEFAULT_CONTROL_RESUMPTION_METRES,
};

/**
 * Stage: rango contiguo de índices del track, inmutable una vez emitido
 */
export interface IStage {
  readonly type: StageType;
  readonly startIndex: number;
  readonly endIndex: number; // inclusivo
  readonly start: ITrackPoint;
  readonly end: ITrackPoint;

  // Solo en controles: punto desde el que se mide el desplazamiento
  readonly anchorIndex?: number;

  // El stage empieza cuando termina el anterior (tiempo del punto previo)
  readonly startTime: Date;
  readonly endTime: Date;
  readonly durationSeconds: number;

  readonly distanceMetres: number;
  readonly ascentMetres: number;
  readonly descentMetres: number;
  readonly averageSpeedKmh: number;
  readonly maxSpeedKmh: number;
  readonly minElevation?: number;
  readonly maxElevation?: number;

  // Acumulados desde el inicio del track hasta el final del stage
  readonly runningMetres: number;
  readonly runningSeconds: number;

  // Geocoding (best-effort)
  readonly startPlace?: string;
  readonly endPlace?: string;
  readonly anchorPlace?: string;
  readonly description?: string;
}

/**
 * Resumen del conjunto de stages de un ride
 */
export interface IStageSummary {
  startTime: Date;
  endTime: Date;
  durationSeconds: number;
  distanceMetres: number;
  movingSeconds: number;
  controlSeconds: number;
  movingPercent: number;
  controlPercent: number;
  averageMovingSpeedKmh: number;
  averageOverallSpeedKmh: number;
  ascentMetres: number;
  descentMetres: number;
  maxSpeedKmh: number;
  minElevation?: number;
  maxElevation?: number;
  stageCount: number;
  controlCount: number;
}
