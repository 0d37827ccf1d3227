import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { errorMessage, errorStack, isContractViolation } from '../common/errors';
import { AnalysisService } from './analysis.service';
import { AnalyseBatchDto, AnalyseRideDto, toAnalysisInput } from './dto';
import { IBatchItemResult, IRideAnalysis } from './models';

@Controller('api/rides')
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(private readonly analysisService: AnalysisService) {}

  /**
   * POST /api/rides/analyse
   *
   * Analiza un ride: simplifica (si hay tolerancia), detecta stages,
   * les pone nombre y persiste el resultado.
   *
   * Body: { name?, points: [{ lat, lon, ele?, time }], toleranceMetres?, ... }
   */
  @Post('analyse')
  @HttpCode(HttpStatus.OK)
  async analyse(
    @Body() body: AnalyseRideDto,
  ): Promise<{ success: boolean; data: IRideAnalysis }> {
    this.logger.log(
      `POST /api/rides/analyse - name=${body.name ?? 'unnamed'}, points=${body.points.length}`,
    );

    try {
      const data = await this.analysisService.analyse(toAnalysisInput(body));
      return { success: true, data };
    } catch (error) {
      throw this.toHttpException(error, 'Error analysing ride');
    }
  }

  /**
   * POST /api/rides/analyse/batch
   *
   * Analiza varios rides en paralelo; un fallo se informa por ride.
   * Con join=true se unen en un único ride (ordenados por su primer punto).
   */
  @Post('analyse/batch')
  @HttpCode(HttpStatus.OK)
  async analyseBatch(
    @Body() body: AnalyseBatchDto,
  ): Promise<{ success: boolean; data: IBatchItemResult[] }> {
    this.logger.log(
      `POST /api/rides/analyse/batch - rides=${body.rides.length}, join=${body.join === true}`,
    );

    try {
      const data = await this.analysisService.analyseMany(
        body.rides.map(toAnalysisInput),
        { join: body.join === true },
      );
      return { success: data.every((item) => item.status === 'fulfilled'), data };
    } catch (error) {
      throw this.toHttpException(error, 'Error analysing rides');
    }
  }

  private toHttpException(error: unknown, message: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }

    if (isContractViolation(error)) {
      return new HttpException(
        {
          statusCode: HttpStatus.BAD_REQUEST,
          message: error.message,
          error: error.kind,
        },
        HttpStatus.BAD_REQUEST,
      );
    }

    this.logger.error(`${message}: ${errorMessage(error)}`, errorStack(error));
    return new HttpException(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message,
        error: 'Internal Server Error',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
