/**
 * DTO de respuesta para stages de un ride
 */
export class StageResponseDto {
  sequence!: number;

  /**
   * 'Moving' | 'Control'
   */
  type!: string;

  startIndex!: number;
  endIndex!: number;

  startTime!: string;
  endTime!: string;

  /**
   * Duración en segundos
   */
  duration!: number;

  /**
   * Distancia recorrida (metros)
   */
  distance!: number;

  ascent!: number;
  descent!: number;
  averageSpeed!: number;
  maxSpeed!: number;

  startLat!: number;
  startLon!: number;
  endLat!: number;
  endLon!: number;

  startPlace?: string;
  endPlace?: string;

  /**
   * Lugar del control (solo stages Control)
   */
  anchorPlace?: string;

  description?: string;
}
