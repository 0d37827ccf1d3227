/**
 * Geodesia sobre esfera (radio ecuatorial WGS84)
 *
 * Limitación conocida: cerca de los polos la aproximación esférica y las
 * celdas en grados se distorsionan. Fuera de alcance.
 */

/**
 * Radio de la Tierra en metros (WGS84 ecuatorial)
 */
export const EARTH_RADIUS_M = 6378137;

export interface ILatLon {
  lat: number;
  lon: number;
}

export const toRadians = (degrees: number): number => degrees * (Math.PI / 180);

/**
 * Distancia entre dos puntos GPS usando la fórmula de Haversine (metros)
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_M * c;
}

export const distanceBetween = (a: ILatLon, b: ILatLon): number =>
  haversineDistance(a.lat, a.lon, b.lat, b.lon);

/**
 * Rumbo inicial de `from` hacia `to` (radianes)
 */
export function initialBearing(from: ILatLon, to: ILatLon): number {
  const phi1 = toRadians(from.lat);
  const phi2 = toRadians(to.lat);
  const dLon = toRadians(to.lon - from.lon);

  const y = Math.sin(dLon) * Math.cos(phi2);
  const x =
    Math.cos(phi1) * Math.sin(phi2) -
    Math.sin(phi1) * Math.cos(phi2) * Math.cos(dLon);

  return Math.atan2(y, x);
}

/**
 * Distancia (absoluta) del punto al gran círculo que pasa por start y end
 */
export function crossTrackDistance(
  point: ILatLon,
  start: ILatLon,
  end: ILatLon,
): number {
  const angular = distanceBetween(start, point) / EARTH_RADIUS_M;
  const bearingToPoint = initialBearing(start, point);
  const bearingToEnd = initialBearing(start, end);

  const xt = Math.asin(
    clamp(Math.sin(angular) * Math.sin(bearingToPoint - bearingToEnd), -1, 1),
  );

  return Math.abs(xt * EARTH_RADIUS_M);
}

/**
 * Distancia desde start hasta la proyección del punto sobre el gran círculo.
 * Negativa si la proyección cae antes de start.
 */
export function alongTrackDistance(
  point: ILatLon,
  start: ILatLon,
  end: ILatLon,
): number {
  const angular = distanceBetween(start, point) / EARTH_RADIUS_M;
  const xt = crossTrackDistance(point, start, end) / EARTH_RADIUS_M;
  const cosXt = Math.cos(xt);
  const along = Math.acos(clamp(Math.cos(angular) / (cosXt === 0 ? 1 : cosXt), -1, 1));

  const bearingDelta = initialBearing(start, point) - initialBearing(start, end);
  const sign = Math.cos(bearingDelta) < 0 ? -1 : 1;

  return sign * along * EARTH_RADIUS_M;
}

/**
 * Distancia del punto al segmento (cuerda) start-end:
 * - cross-track si la proyección cae dentro del segmento
 * - si no, distancia al extremo más cercano
 */
export function distanceToSegment(
  point: ILatLon,
  start: ILatLon,
  end: ILatLon,
): number {
  const segmentLength = distanceBetween(start, end);
  if (segmentLength === 0) {
    return distanceBetween(start, point);
  }

  const along = alongTrackDistance(point, start, end);
  if (along <= 0) {
    return distanceBetween(start, point);
  }
  if (along >= segmentLength) {
    return distanceBetween(end, point);
  }

  return crossTrackDistance(point, start, end);
}

/**
 * Velocidad en km/h a partir de metros y segundos
 */
export function speedKmh(metres: number, seconds: number): number {
  if (seconds <= 0) {
    return metres > 0 ? Number.POSITIVE_INFINITY : 0;
  }
  return (metres / seconds) * 3.6;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
