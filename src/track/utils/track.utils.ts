import { EmptyTrackError, TrackOrderError } from '../../common/errors';
import { haversineDistance, speedKmh } from '../../geo/geodesy';
import {
  COORDINATE_DECIMALS,
  ELEVATION_DECIMALS,
  IEnrichedTrackPoint,
  IRawTrackPoint,
  ITrack,
  ITrackPoint,
} from '../models';

const roundTo = (value: number, decimals: number): number =>
  Number(value.toFixed(decimals));

// Rango de Date en ECMAScript (±100 000 000 días)
const MAX_EPOCH_MILLIS = 8.64e15;

const toEpochMillis = (time: IRawTrackPoint['time']): number => {
  if (typeof time === 'number') return time;
  if (time instanceof Date) return time.getTime();
  return Date.parse(time);
};

/**
 * Crea un punto aplicando la precisión del modelo (6 decimales lat/lon, 1 elevación)
 */
export function createTrackPoint(raw: IRawTrackPoint): ITrackPoint {
  const time = toEpochMillis(raw.time);
  if (!Number.isFinite(time) || Math.abs(time) > MAX_EPOCH_MILLIS) {
    throw new TrackOrderError(`Trackpoint has an invalid timestamp: ${String(raw.time)}`);
  }

  const point: ITrackPoint =
    raw.ele === undefined || raw.ele === null
      ? {
          lat: roundTo(raw.lat, COORDINATE_DECIMALS),
          lon: roundTo(raw.lon, COORDINATE_DECIMALS),
          time,
        }
      : {
          lat: roundTo(raw.lat, COORDINATE_DECIMALS),
          lon: roundTo(raw.lon, COORDINATE_DECIMALS),
          ele: roundTo(raw.ele, ELEVATION_DECIMALS),
          time,
        };

  return Object.freeze(point);
}

/**
 * Construye un track validado a partir de puntos crudos
 */
export function createTrack(raw: IRawTrackPoint[], name?: string): ITrack {
  const track: ITrack = {
    name,
    points: Object.freeze(raw.map(createTrackPoint)),
  };
  assertValidTrack(track);
  return track;
}

/**
 * Verifica las invariantes del track: no vacío y timestamps no decrecientes.
 * Es responsabilidad del decoder; aquí se falla de inmediato si no se cumplen.
 */
export function assertValidTrack(track: ITrack): void {
  if (track.points.length === 0) {
    throw new EmptyTrackError(track.name);
  }

  for (let i = 1; i < track.points.length; i++) {
    if (track.points[i].time < track.points[i - 1].time) {
      throw new TrackOrderError(
        `Timestamps decrease at point ${i} ` +
          `(${track.points[i - 1].time} ms > ${track.points[i].time} ms)`,
      );
    }
  }
}

/**
 * Une varios tracks en uno solo, ordenados por su primer timestamp.
 *
 * NOTA: no se interpola nada entre fuentes; el salto de tiempo/posición entre
 * el último punto de una y el primero de la siguiente se conserva tal cual.
 */
export function joinTracks(tracks: ITrack[]): ITrack {
  const sources = tracks.filter((track) => track.points.length > 0);
  if (sources.length === 0) {
    throw new EmptyTrackError('join');
  }

  const ordered = [...sources].sort(
    (a, b) => a.points[0].time - b.points[0].time,
  );

  const points: ITrackPoint[] = [];
  for (const track of ordered) {
    const last = points[points.length - 1];
    if (last && track.points[0].time < last.time) {
      throw new TrackOrderError(
        `Track "${track.name ?? 'unnamed'}" overlaps in time with the previous one`,
      );
    }
    points.push(...track.points);
  }

  return {
    name: ordered[0].name,
    points: Object.freeze(points),
  };
}

/**
 * Calcula distancia, velocidad y desnivel acumulados por punto
 */
export function enrichTrack(track: ITrack): IEnrichedTrackPoint[] {
  assertValidTrack(track);

  const enriched: IEnrichedTrackPoint[] = [];

  track.points.forEach((point, index) => {
    const previous = enriched[index - 1];

    if (!previous) {
      enriched.push({
        ...point,
        index,
        deltaMetres: 0,
        deltaSeconds: 0,
        speedKmh: 0,
        runningMetres: 0,
        runningAscentMetres: 0,
        runningDescentMetres: 0,
      });
      return;
    }

    const deltaMetres = haversineDistance(
      previous.lat,
      previous.lon,
      point.lat,
      point.lon,
    );
    const deltaSeconds = (point.time - previous.time) / 1000;

    // Sin elevación en alguno de los dos puntos no hay desnivel
    const climb =
      point.ele !== undefined && previous.ele !== undefined
        ? point.ele - previous.ele
        : 0;

    enriched.push({
      ...point,
      index,
      deltaMetres,
      deltaSeconds,
      speedKmh: speedKmh(deltaMetres, deltaSeconds),
      runningMetres: previous.runningMetres + deltaMetres,
      runningAscentMetres: previous.runningAscentMetres + Math.max(climb, 0),
      runningDescentMetres: previous.runningDescentMetres + Math.max(-climb, 0),
    });
  });

  return enriched;
}
