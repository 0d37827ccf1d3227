import { Injectable } from '@nestjs/common';
import { distanceBetween, speedKmh } from '../../geo/geodesy';
import { ITrackPoint } from '../../track';
import {
  IStageBoundary,
  IStageDetectionParameters,
  ISegmentationTransition,
  SegmentationState,
  StageType,
} from '../models';

type TentativeState = Extract<SegmentationState, { kind: 'tentative-control' }>;
type ControlState = Extract<SegmentationState, { kind: 'control' }>;
type MovingState = Extract<SegmentationState, { kind: 'moving' }>;

/**
 * Máquina de estados Moving / Control con histéresis de velocidad y distancia
 *
 * Cada transición es una función total de (estado actual, siguiente punto):
 * no guarda nada entre llamadas, así que se puede probar transición a
 * transición y compartir entre análisis concurrentes.
 */
@Injectable()
export class StateMachineService {
  /**
   * Procesa el punto `index` (>= 1) del track
   */
  transition(
    state: SegmentationState,
    points: readonly ITrackPoint[],
    index: number,
    params: IStageDetectionParameters,
  ): ISegmentationTransition {
    switch (state.kind) {
      case 'moving':
        return this.fromMoving(state, points, index, params);
      case 'tentative-control':
        return this.fromTentative(state, points, index, params);
      case 'control':
        return this.fromControl(state, points, index, params);
    }
  }

  /**
   * Cierra el stage abierto en el último punto del track.
   * Un candidato pendiente se integra en el stage en movimiento.
   */
  finish(state: SegmentationState, lastIndex: number): IStageBoundary | undefined {
    // El control anterior terminó justo en el último punto
    if (state.stageStart > lastIndex) {
      return undefined;
    }

    if (state.kind === 'control') {
      return {
        type: StageType.CONTROL,
        startIndex: state.stageStart,
        endIndex: lastIndex,
        anchorIndex: state.anchor,
      };
    }

    return {
      type: StageType.MOVING,
      startIndex: state.stageStart,
      endIndex: lastIndex,
    };
  }

  private fromMoving(
    state: MovingState,
    points: readonly ITrackPoint[],
    index: number,
    params: IStageDetectionParameters,
  ): ISegmentationTransition {
    // El primer punto del stage no tiene segmento propio dentro del stage
    if (index - 1 < state.stageStart) {
      return { state };
    }

    const previous = points[index - 1];
    const current = points[index];
    const speed = speedKmh(
      distanceBetween(previous, current),
      (current.time - previous.time) / 1000,
    );

    if (speed >= params.controlSpeedKmh) {
      return { state };
    }

    // Candidato anclado en el último punto antes de frenar
    const tentative: TentativeState = {
      kind: 'tentative-control',
      stageStart: state.stageStart,
      anchor: index - 1,
      since: previous.time,
    };

    // Un único punto tras una parada larga ya puede confirmar el control
    return this.fromTentative(tentative, points, index, params);
  }

  private fromTentative(
    state: TentativeState,
    points: readonly ITrackPoint[],
    index: number,
    params: IStageDetectionParameters,
  ): ISegmentationTransition {
    const current = points[index];
    const displacement = distanceBetween(points[state.anchor], current);

    // Se alejó antes de tiempo (semáforo): se descarta sin insertar frontera
    if (displacement > params.controlResumptionMetres) {
      return { state: { kind: 'moving', stageStart: state.stageStart } };
    }

    if (current.time - state.since < params.minControlSeconds * 1000) {
      return { state };
    }

    // Control desde el primer punto del track: no hay stage en movimiento que cerrar.
    // Tras un control, el Moving que lo sigue se emite aunque tenga un solo punto.
    if (state.anchor === 0) {
      return {
        state: { kind: 'control', stageStart: state.anchor, anchor: state.anchor },
      };
    }

    return {
      state: { kind: 'control', stageStart: state.anchor + 1, anchor: state.anchor },
      boundary: {
        type: StageType.MOVING,
        startIndex: state.stageStart,
        endIndex: state.anchor,
      },
    };
  }

  private fromControl(
    state: ControlState,
    points: readonly ITrackPoint[],
    index: number,
    params: IStageDetectionParameters,
  ): ISegmentationTransition {
    // Distancia en línea recta: con el GPS parado las lecturas son muy ruidosas
    const displacement = distanceBetween(points[state.anchor], points[index]);

    if (displacement <= params.controlResumptionMetres) {
      return { state };
    }

    return {
      state: { kind: 'moving', stageStart: index + 1 },
      boundary: {
        type: StageType.CONTROL,
        startIndex: state.stageStart,
        endIndex: index,
        anchorIndex: state.anchor,
      },
    };
  }
}
