import { IsDateString, IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { StageType } from '../../stages/models/stage.model';

/**
 * DTO para query params de GET /api/reports/rides
 */
export class QueryReportsDto {
  /**
   * Fecha de inicio en formato ISO 8601
   * Ejemplo: "2024-01-01T00:00:00Z"
   */
  @IsDateString()
  from!: string;

  /**
   * Fecha de fin en formato ISO 8601
   * Ejemplo: "2024-01-31T23:59:59Z"
   */
  @IsDateString()
  to!: string;

  /**
   * Límite de resultados (los últimos x rides)
   */
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}

/**
 * DTO para query params de GET /api/reports/rides/:rideId/stages
 */
export class QueryStagesDto {
  @IsOptional()
  @IsIn([StageType.MOVING, StageType.CONTROL])
  type?: StageType;
}
