/**
 * Modelo canónico de track
 *
 * Contrato compartido entre los decoders (GPX/FIT, externos) y el motor de
 * análisis. Los puntos son inmutables una vez creados.
 */

/**
 * Punto de track
 */
export interface ITrackPoint {
  /**
   * Latitud en grados decimales, 6 decimales (~11 cm)
   */
  readonly lat: number;

  /**
   * Longitud en grados decimales, 6 decimales
   */
  readonly lon: number;

  /**
   * Elevación en metros, 1 decimal (opcional, no todos los dispositivos la registran)
   */
  readonly ele?: number;

  /**
   * Timestamp UTC en milisegundos (Unix epoch)
   */
  readonly time: number;
}

/**
 * Track: secuencia ordenada y no vacía de puntos.
 * Puede ser la concatenación de varias grabaciones (paso de join).
 */
export interface ITrack {
  readonly name?: string;
  readonly points: readonly ITrackPoint[];
}

/**
 * Punto enriquecido con datos derivados, calculado una vez por análisis
 */
export interface IEnrichedTrackPoint extends ITrackPoint {
  index: number;
  deltaMetres: number; // distancia desde el punto anterior
  deltaSeconds: number;
  speedKmh: number; // velocidad del segmento que termina en este punto
  runningMetres: number; // acumulado desde el inicio del track
  runningAscentMetres: number;
  runningDescentMetres: number;
}

/**
 * Datos crudos que entrega un decoder (o el body HTTP)
 */
export interface IRawTrackPoint {
  lat: number;
  lon: number;
  ele?: number | null;
  time: number | string | Date;
}

export const COORDINATE_DECIMALS = 6;
export const ELEVATION_DECIMALS = 1;
