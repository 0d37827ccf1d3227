import { EARTH_RADIUS_M, haversineDistance, toRadians } from '../../geo/geodesy';
import { IPlaceMatch, IPlaceRecord } from '../models';

// Más allá de este radio (en grados) se recorre todo el arena
const MAX_RING_SPAN_DEGREES = 10;

/**
 * Índice espacial de vecino más cercano sobre una grilla lat/lon
 *
 * Los registros viven una sola vez en un arena (array + coordenadas en
 * Float64Array); las celdas guardan índices enteros al arena. Se construye
 * una vez y es de solo lectura: se comparte entre análisis concurrentes sin
 * locks.
 */
export class SpatialIndex {
  private readonly lats: Float64Array;
  private readonly lons: Float64Array;
  private readonly buckets = new Map<number, number[]>();
  private readonly rows: number;
  private readonly cols: number;
  private readonly maxRings: number;

  private constructor(
    private readonly places: readonly IPlaceRecord[],
    readonly cellSizeDegrees: number,
  ) {
    if (!(cellSizeDegrees > 0) || cellSizeDegrees > 90) {
      throw new RangeError(`Invalid cell size ${cellSizeDegrees}`);
    }

    this.rows = Math.ceil(180 / cellSizeDegrees);
    this.cols = Math.ceil(360 / cellSizeDegrees);
    this.maxRings = Math.max(1, Math.ceil(MAX_RING_SPAN_DEGREES / cellSizeDegrees));
    this.lats = new Float64Array(places.length);
    this.lons = new Float64Array(places.length);

    places.forEach((place, index) => {
      this.lats[index] = place.lat;
      this.lons[index] = place.lon;

      const key = this.cellKey(this.rowOf(place.lat), this.colOf(place.lon));
      const bucket = this.buckets.get(key);
      if (bucket) {
        bucket.push(index);
      } else {
        this.buckets.set(key, [index]);
      }
    });
  }

  static build(places: readonly IPlaceRecord[], cellSizeDegrees = 0.25): SpatialIndex {
    return new SpatialIndex(places, cellSizeDegrees);
  }

  static empty(): SpatialIndex {
    return new SpatialIndex([], 1);
  }

  get size(): number {
    return this.places.length;
  }

  get cellCount(): number {
    return this.buckets.size;
  }

  /**
   * Lugar más cercano a (lat, lon), o undefined si el índice está vacío.
   * Ante distancias iguales gana el registro cargado primero.
   */
  nearest(lat: number, lon: number): IPlaceMatch | undefined {
    if (this.places.length === 0) {
      return undefined;
    }

    const row = this.rowOf(lat);
    const col = this.colOf(lon);

    let bestIndex = -1;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (let ring = 0; ring <= this.maxRings; ring++) {
      // Anillo que ya da la vuelta al mundo en longitud
      if (2 * ring + 1 > this.cols) {
        break;
      }

      for (const index of this.ringCandidates(row, col, ring)) {
        const distance = haversineDistance(lat, lon, this.lats[index], this.lons[index]);
        if (
          distance < bestDistance ||
          (distance === bestDistance && index < bestIndex)
        ) {
          bestDistance = distance;
          bestIndex = index;
        }
      }

      // Las celdas del anillo siguiente no pueden mejorar al mejor candidato
      if (bestIndex >= 0 && this.ringLowerBound(lat, ring) > bestDistance) {
        return { place: this.places[bestIndex], distanceMetres: bestDistance };
      }
    }

    return this.linearScan(lat, lon);
  }

  private linearScan(lat: number, lon: number): IPlaceMatch {
    let bestIndex = 0;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (let index = 0; index < this.places.length; index++) {
      const distance = haversineDistance(lat, lon, this.lats[index], this.lons[index]);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestIndex = index;
      }
    }

    return { place: this.places[bestIndex], distanceMetres: bestDistance };
  }

  /**
   * Índices de las celdas a distancia (Chebyshev) exactamente `ring`
   */
  private *ringCandidates(row: number, col: number, ring: number): Generator<number> {
    for (let dr = -ring; dr <= ring; dr++) {
      const r = row + dr;
      if (r < 0 || r >= this.rows) {
        continue;
      }

      const onEdgeRow = Math.abs(dr) === ring;
      const step = onEdgeRow || ring === 0 ? 1 : 2 * ring;

      for (let dc = -ring; dc <= ring; dc += step) {
        const bucket = this.buckets.get(this.cellKey(r, this.wrapCol(col + dc)));
        if (bucket) {
          yield* bucket;
        }
      }
    }
  }

  /**
   * Distancia mínima (aproximada) a cualquier celda del anillo ring + 1.
   * En longitud las celdas se estrechan con cos(lat); se usa la latitud más
   * alta que alcanza ese anillo.
   */
  private ringLowerBound(lat: number, ring: number): number {
    const span = toRadians(ring * this.cellSizeDegrees);
    const latBound = EARTH_RADIUS_M * span;

    const maxLat = Math.min(90, Math.abs(lat) + (ring + 2) * this.cellSizeDegrees);
    const lonBound =
      2 * EARTH_RADIUS_M * Math.cos(toRadians(maxLat)) * Math.sin(Math.min(span, Math.PI) / 2);

    return Math.min(latBound, lonBound);
  }

  private rowOf(lat: number): number {
    const row = Math.floor((lat + 90) / this.cellSizeDegrees);
    return Math.min(this.rows - 1, Math.max(0, row));
  }

  private colOf(lon: number): number {
    return this.wrapCol(Math.floor((lon + 180) / this.cellSizeDegrees));
  }

  private wrapCol(col: number): number {
    return ((col % this.cols) + this.cols) % this.cols;
  }

  private cellKey(row: number, col: number): number {
    return row * this.cols + col;
  }
}
