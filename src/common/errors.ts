/**
 * Tipos de error del motor de análisis
 */
export type RideAnalysisErrorKind =
  | 'InvalidTolerance'
  | 'EmptyTrack'
  | 'TrackOrder'
  | 'StageInvariant'
  | 'GeocodeFetchFailed'
  | 'GazetteerParse';

/**
 * Error base del dominio. El campo `kind` permite discriminar sin instanceof
 */
export abstract class RideAnalysisError extends Error {
  abstract readonly kind: RideAnalysisErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Violaciones de contrato: el llamador pasó datos inválidos
 */
export class InvalidToleranceError extends RideAnalysisError {
  readonly kind = 'InvalidTolerance';

  constructor(readonly tolerance: number) {
    super(`Tolerance must be a finite number of metres > 0, got ${tolerance}`);
  }
}

export class EmptyTrackError extends RideAnalysisError {
  readonly kind = 'EmptyTrack';

  constructor(context?: string) {
    super(context ? `Track has no points (${context})` : 'Track has no points');
  }
}

export class TrackOrderError extends RideAnalysisError {
  readonly kind = 'TrackOrder';

  constructor(message: string) {
    super(message);
  }
}

export class StageInvariantError extends RideAnalysisError {
  readonly kind = 'StageInvariant';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Servicio degradado: se registra por país, nunca aborta un análisis
 */
export class GeocodeFetchFailedError extends RideAnalysisError {
  readonly kind = 'GeocodeFetchFailed';

  /**
   * @param source código de país o nombre del archivo de regiones
   */
  constructor(
    readonly source: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not load gazetteer for ${source}: ${reason}`, options);
  }
}

export class GazetteerParseError extends RideAnalysisError {
  readonly kind = 'GazetteerParse';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Errores que indican que el llamador violó el contrato (HTTP 400)
 */
export const isContractViolation = (error: unknown): error is RideAnalysisError =>
  error instanceof RideAnalysisError &&
  (error.kind === 'InvalidTolerance' ||
    error.kind === 'EmptyTrack' ||
    error.kind === 'TrackOrder');

// Sin instanceof: los errores de los módulos de Node pueden venir de otro realm (ej: Jest)
export const errorMessage = (error: unknown): string =>
  typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
    ? error.message
    : String(error);

export const errorStack = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'stack' in error && typeof error.stack === 'string'
    ? error.stack
    : undefined;

/**
 * Código de error de sistema (ENOENT, ENOTDIR...), si lo tiene
 */
export const hasErrorCode = (error: unknown, code: string): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === code;
