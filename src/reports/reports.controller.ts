import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { ReportsService } from './reports.service';
import {
  QueryReportsDto,
  QueryStagesDto,
  RideResponseDto,
  StageResponseDto,
} from './dto';

/**
 * Controlador de reportes históricos
 */
@Controller('api/reports')
export class ReportsController {
  private readonly logger = new Logger(ReportsController.name);

  constructor(private readonly reportsService: ReportsService) {}

  /**
   * GET /api/reports/rides
   * Obtener rides analizados
   *
   * Query params:
   * - from: ISO 8601 date-time - Fecha inicio
   * - to: ISO 8601 date-time - Fecha fin
   * - limit: number (opcional) - Límite de resultados (trae los últimos x rides)
   *
   * Ejemplo:
   * GET /api/reports/rides?from=2024-01-01T00:00:00Z&to=2024-01-31T23:59:59Z&limit=10
   */
  @Get('rides')
  async getRides(
    @Query(new ValidationPipe({ transform: true }))
    query: QueryReportsDto,
  ): Promise<RideResponseDto[]> {
    this.logger.log(
      `GET /api/reports/rides - from=${query.from}, to=${query.to}, limit=${query.limit ?? 'none'}`,
    );

    return await this.reportsService.getRides(query);
  }

  /**
   * GET /api/reports/rides/:rideId
   * Ride con todos sus stages
   */
  @Get('rides/:rideId')
  async getRide(
    @Param('rideId', ParseUUIDPipe) rideId: string,
  ): Promise<RideResponseDto> {
    const ride = await this.reportsService.getRide(rideId);

    if (!ride) {
      throw this.notFound(rideId);
    }

    return ride;
  }

  /**
   * GET /api/reports/rides/:rideId/stages?type=Moving|Control
   */
  @Get('rides/:rideId/stages')
  async getStages(
    @Param('rideId', ParseUUIDPipe) rideId: string,
    @Query(new ValidationPipe({ transform: true }))
    query: QueryStagesDto,
  ): Promise<StageResponseDto[]> {
    const stages = await this.reportsService.getStages(rideId, query.type);

    if (!stages) {
      throw this.notFound(rideId);
    }

    return stages;
  }

  /**
   * DELETE /api/reports/rides/:rideId
   */
  @Delete('rides/:rideId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteRide(@Param('rideId', ParseUUIDPipe) rideId: string): Promise<void> {
    const deleted = await this.reportsService.deleteRide(rideId);

    if (!deleted) {
      throw this.notFound(rideId);
    }
  }

  private notFound(rideId: string): HttpException {
    return new HttpException(
      {
        statusCode: HttpStatus.NOT_FOUND,
        message: `Ride ${rideId} not found`,
        error: 'Not Found',
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
