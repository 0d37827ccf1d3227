import { ITrack, IRawTrackPoint } from '../../track';
import { IStage, IStageDetectionParameters, IStageSummary } from '../../stages';

/**
 * Entrada del pipeline: un ride decodificado más sus parámetros
 */
export interface IAnalyseRideInput {
  name?: string;
  points: IRawTrackPoint[];
  toleranceMetres?: number;
  parameters?: Partial<IStageDetectionParameters>;
}

/**
 * Resultado del análisis de un ride
 */
export interface IRideAnalysis {
  id: string;
  name?: string;
  originalPointCount: number;
  analysedPointCount: number;
  toleranceMetres?: number;
  simplifiedTrack?: ITrack;
  parameters: IStageDetectionParameters;
  stages: IStage[];
  summary: IStageSummary;
  persisted: boolean;
}

export interface IAnalyseManyOptions {
  join?: boolean;
}

/**
 * Resultado por ride en un batch: un fallo no detiene a los demás
 */
export type IBatchItemResult =
  | { index: number; name?: string; status: 'fulfilled'; analysis: IRideAnalysis }
  | { index: number; name?: string; status: 'rejected'; error: string; kind?: string };
