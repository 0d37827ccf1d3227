import { Injectable, Logger } from '@nestjs/common';
import { EmptyTrackError, InvalidToleranceError } from '../../common/errors';
import { distanceToSegment } from '../../geo/geodesy';
import { ITrack } from '../../track';

/**
 * Resultado de simplificar un track
 */
export interface ISimplificationResult {
  track: ITrack;
  originalCount: number;
  simplifiedCount: number;
}

/**
 * Simplificación Ramer-Douglas-Peucker sobre distancia geodésica
 *
 * La distancia de cada punto a la cuerda se mide con cross-track (gran
 * círculo), no con distancia euclídea en grados, así que la tolerancia se
 * expresa en metros a cualquier latitud.
 */
@Injectable()
export class SimplificationService {
  private readonly logger = new Logger(SimplificationService.name);

  /**
   * Devuelve un subconjunto de los puntos tal que ningún punto descartado
   * queda a más de `toleranceMetres` de la polilínea resultante.
   * Los extremos siempre se conservan.
   */
  simplify(track: ITrack, toleranceMetres: number): ITrack {
    if (!Number.isFinite(toleranceMetres) || toleranceMetres <= 0) {
      throw new InvalidToleranceError(toleranceMetres);
    }

    const points = track.points;
    if (points.length === 0) {
      throw new EmptyTrackError(track.name);
    }
    if (points.length < 3) {
      return track;
    }

    const keep = new Uint8Array(points.length);
    keep[0] = 1;
    keep[points.length - 1] = 1;

    // Pila explícita en lugar de recursión: tracks de >100k puntos
    const pending: Array<[number, number]> = [[0, points.length - 1]];

    while (pending.length > 0) {
      const segment = pending.pop();
      if (!segment) break;
      const [first, last] = segment;

      // Segmentos de 2 puntos no tienen interior
      if (last - first < 2) {
        continue;
      }

      let maxDistance = -1;
      let maxIndex = first;
      for (let i = first + 1; i < last; i++) {
        const distance = distanceToSegment(points[i], points[first], points[last]);
        // Estricto: ante empate gana el primero encontrado
        if (distance > maxDistance) {
          maxDistance = distance;
          maxIndex = i;
        }
      }

      if (maxDistance <= toleranceMetres) {
        continue;
      }

      keep[maxIndex] = 1;
      pending.push([maxIndex, last]);
      pending.push([first, maxIndex]);
    }

    return {
      name: track.name,
      points: Object.freeze(points.filter((_, index) => keep[index] === 1)),
    };
  }

  /**
   * Igual que simplify() pero informa la reducción conseguida
   */
  simplifyWithReport(track: ITrack, toleranceMetres: number): ISimplificationResult {
    const simplified = this.simplify(track, toleranceMetres);
    const originalCount = track.points.length;
    const simplifiedCount = simplified.points.length;

    this.logger.log(
      `Ramer-Douglas-Peucker with a tolerance of ${toleranceMetres}m reduced ` +
        `the trackpoint count from ${originalCount} to ${simplifiedCount} ` +
        `for ${track.name ?? 'unnamed track'}`,
    );

    return { track: simplified, originalCount, simplifiedCount };
  }
}
