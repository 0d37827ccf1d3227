import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsDateString,
  IsDefined,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

/**
 * Punto de track tal como lo entrega el decoder
 */
export class TrackPointDto {
  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @IsNumber()
  @Min(-180)
  @Max(180)
  lon!: number;

  @IsOptional()
  @IsNumber()
  ele?: number;

  /**
   * Epoch en milisegundos o fecha ISO 8601
   * Ejemplo: 1717236000000 o "2024-06-01T10:00:00Z"
   */
  @IsDefined()
  @ValidateIf((point: TrackPointDto) => typeof point.time !== 'number')
  @IsDateString()
  time!: number | string;
}

/**
 * Body de POST /api/rides/analyse
 */
export class AnalyseRideDto {
  @IsOptional()
  @IsString()
  name?: string;

  /**
   * Puede venir de varias grabaciones ya concatenadas por el decoder
   */
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TrackPointDto)
  points!: TrackPointDto[];

  /**
   * Tolerancia de simplificación en metros. Sin valor no se simplifica
   */
  @IsOptional()
  @IsNumber()
  toleranceMetres?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  controlSpeedKmh?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  minControlSeconds?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  controlResumptionMetres?: number;
}

/**
 * Body de POST /api/rides/analyse/batch
 */
export class AnalyseBatchDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => AnalyseRideDto)
  rides!: AnalyseRideDto[];

  /**
   * Unir todas las grabaciones en un único ride antes de analizar
   */
  @IsOptional()
  @IsBoolean()
  join?: boolean;
}
