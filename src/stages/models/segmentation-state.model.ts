import { StageType } from './stage.model';

/**
 * Estado de la máquina de segmentación.
 *
 * - moving: stage en movimiento abierto desde stageStart
 * - tentative-control: seguimos en movimiento, pero hay un candidato a control
 *   anclado en `anchor` desde `since` (ms). Todavía no hay frontera.
 * - control: control confirmado; se mide el desplazamiento desde `anchor`
 */
export type SegmentationState =
  | { kind: 'moving'; stageStart: number }
  | { kind: 'tentative-control'; stageStart: number; anchor: number; since: number }
  | { kind: 'control'; stageStart: number; anchor: number };

/**
 * Frontera emitida por una transición: cierra un stage en endIndex (inclusivo)
 */
export interface IStageBoundary {
  type: StageType;
  startIndex: number;
  endIndex: number;
  anchorIndex?: number;
}

/**
 * Resultado de procesar un punto
 */
export interface ISegmentationTransition {
  state: SegmentationState;
  boundary?: IStageBoundary;
}

export const initialSegmentationState = (): SegmentationState => ({
  kind: 'moving',
  stageStart: 0,
});
