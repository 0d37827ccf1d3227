import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { RideAnalysisError, errorMessage } from '../common/errors';
import { DEFAULT_TOLERANCE_METRES } from '../env';
import { GeocodingService } from '../geocoding/services/geocoding.service';
import { SimplificationService } from '../simplification/services';
import {
  DEFAULT_STAGE_PARAMETERS,
  IStageDetectionParameters,
  StageDetectorService,
  StageSummaryService,
} from '../stages';
import { ITrack, createTrack, joinTracks } from '../track';
import {
  IAnalyseManyOptions,
  IAnalyseRideInput,
  IBatchItemResult,
  IRideAnalysis,
} from './models';
import { RidePersistenceService } from './services/ride-persistence.service';

/**
 * Pipeline de análisis de un ride
 *
 * track -> (simplificación) -> stages -> resumen -> persistencia
 *
 * Los errores de geometría y segmentación son violaciones de contrato y se
 * propagan; el geocoding y la persistencia solo degradan el resultado.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly simplification: SimplificationService,
    private readonly stageDetector: StageDetectorService,
    private readonly stageSummary: StageSummaryService,
    private readonly geocoding: GeocodingService,
    private readonly persistence: RidePersistenceService,
  ) {}

  async analyse(input: IAnalyseRideInput): Promise<IRideAnalysis> {
    const track = createTrack(input.points, input.name);
    return await this.analyseTrack(track, input);
  }

  /**
   * Analiza varios rides en paralelo. Con `join` se unen primero en uno solo
   * (sin interpolar entre grabaciones).
   */
  async analyseMany(
    inputs: IAnalyseRideInput[],
    options: IAnalyseManyOptions = {},
  ): Promise<IBatchItemResult[]> {
    if (options.join) {
      const [result] = await this.settle([
        async () => {
          const joined = joinTracks(
            inputs.map((input) => createTrack(input.points, input.name)),
          );
          this.logger.log(
            `Joined ${inputs.length} tracks into "${joined.name ?? 'unnamed'}" (${joined.points.length} points)`,
          );
          // Los parámetros del primer ride valen para el ride unido
          return await this.analyseTrack(joined, inputs[0]);
        },
      ]);
      return [result];
    }

    return await this.settle(inputs.map((input) => () => this.analyse(input)), inputs);
  }

  private async analyseTrack(
    track: ITrack,
    input: Pick<IAnalyseRideInput, 'toleranceMetres' | 'parameters'>,
  ): Promise<IRideAnalysis> {
    const startedAt = Date.now();
    const parameters = this.resolveParameters(input.parameters);
    const toleranceMetres = input.toleranceMetres ?? DEFAULT_TOLERANCE_METRES;

    let analysed = track;
    let simplifiedTrack: ITrack | undefined;
    if (toleranceMetres !== undefined) {
      const report = this.simplification.simplifyWithReport(track, toleranceMetres);
      analysed = report.track;
      simplifiedTrack = report.track;
    }

    // Sin gazetteer los stages simplemente quedan sin nombre
    await this.geocoding.ready();

    const stages = this.stageDetector.detectStages(analysed, parameters);
    const summary = this.stageSummary.summarise(stages);

    const analysis: Omit<IRideAnalysis, 'persisted'> = {
      id: randomUUID(),
      name: track.name,
      originalPointCount: track.points.length,
      analysedPointCount: analysed.points.length,
      toleranceMetres,
      simplifiedTrack,
      parameters,
      stages,
      summary,
    };

    const persisted = await this.persistence.persist(analysis);

    this.logger.log(
      `Ride ${analysis.id} analysed: ${stages.length} stages, ` +
        `${(summary.distanceMetres / 1000).toFixed(2)} km in ${Date.now() - startedAt}ms`,
    );

    return { ...analysis, persisted };
  }

  private resolveParameters(
    overrides: Partial<IStageDetectionParameters> = {},
  ): IStageDetectionParameters {
    return {
      controlSpeedKmh: overrides.controlSpeedKmh ?? DEFAULT_STAGE_PARAMETERS.controlSpeedKmh,
      minControlSeconds:
        overrides.minControlSeconds ?? DEFAULT_STAGE_PARAMETERS.minControlSeconds,
      controlResumptionMetres:
        overrides.controlResumptionMetres ??
        DEFAULT_STAGE_PARAMETERS.controlResumptionMetres,
    };
  }

  private async settle(
    tasks: Array<() => Promise<IRideAnalysis>>,
    inputs: IAnalyseRideInput[] = [],
  ): Promise<IBatchItemResult[]> {
    const results = await Promise.allSettled(tasks.map((task) => task()));

    return results.map((result, index): IBatchItemResult => {
      const name = inputs[index]?.name;

      if (result.status === 'fulfilled') {
        return {
          index,
          name: result.value.name ?? name,
          status: 'fulfilled',
          analysis: result.value,
        };
      }

      const reason: unknown = result.reason;
      this.logger.warn(`Ride #${index} failed: ${errorMessage(reason)}`);

      return {
        index,
        name,
        status: 'rejected',
        error: errorMessage(reason),
        kind: reason instanceof RideAnalysisError ? reason.kind : undefined,
      };
    });
  }
}
