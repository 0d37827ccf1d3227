import { HttpException, HttpStatus } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { InvalidToleranceError, StageInvariantError } from '../common/errors';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { AnalyseRideDto } from './dto';
import { IAnalyseManyOptions, IAnalyseRideInput, IBatchItemResult, IRideAnalysis } from './models';

const body = (): AnalyseRideDto =>
  Object.assign(new AnalyseRideDto(), {
    name: 'test ride',
    points: [
      { lat: 51.75, lon: -1.26, ele: 60, time: '2024-06-01T10:00:00Z' },
      { lat: 51.751, lon: -1.26, time: 1717236010000 },
    ],
    toleranceMetres: 5,
    minControlSeconds: 60,
  });

const statusOf = async (promise: Promise<unknown>): Promise<number | undefined> => {
  try {
    await promise;
    return undefined;
  } catch (error) {
    return error instanceof HttpException ? error.getStatus() : undefined;
  }
};

describe('AnalysisController', () => {
  let controller: AnalysisController;
  let analyse: jest.Mock<Promise<IRideAnalysis>, [IAnalyseRideInput]>;
  let analyseMany: jest.Mock<Promise<IBatchItemResult[]>, [IAnalyseRideInput[], IAnalyseManyOptions]>;

  beforeEach(async () => {
    analyse = jest.fn<Promise<IRideAnalysis>, [IAnalyseRideInput]>();
    analyseMany = jest.fn<
      Promise<IBatchItemResult[]>,
      [IAnalyseRideInput[], IAnalyseManyOptions]
    >(async () => []);

    const moduleRef = await Test.createTestingModule({
      controllers: [AnalysisController],
      providers: [{ provide: AnalysisService, useValue: { analyse, analyseMany } }],
    }).compile();

    controller = moduleRef.get(AnalysisController);
  });

  it('should map the body to a pipeline input', async () => {
    analyse.mockRejectedValue(new StageInvariantError('not under test'));

    await statusOf(controller.analyse(body()));

    expect(analyse).toHaveBeenCalledWith({
      name: 'test ride',
      points: [
        { lat: 51.75, lon: -1.26, ele: 60, time: '2024-06-01T10:00:00Z' },
        { lat: 51.751, lon: -1.26, ele: undefined, time: 1717236010000 },
      ],
      toleranceMetres: 5,
      parameters: {
        controlSpeedKmh: undefined,
        minControlSeconds: 60,
        controlResumptionMetres: undefined,
      },
    });
  });

  it('should answer 400 for contract violations', async () => {
    analyse.mockRejectedValue(new InvalidToleranceError(0));

    await expect(statusOf(controller.analyse(body()))).resolves.toBe(HttpStatus.BAD_REQUEST);
  });

  it('should answer 500 for anything else', async () => {
    analyse.mockRejectedValue(new StageInvariantError('gap at 3'));

    await expect(statusOf(controller.analyse(body()))).resolves.toBe(
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  });

  it('should pass the join flag to the batch analysis', async () => {
    const response = await controller.analyseBatch({ rides: [body(), body()], join: true });

    expect(analyseMany).toHaveBeenCalledWith(expect.any(Array), { join: true });
    expect(analyseMany.mock.calls[0][0]).toHaveLength(2);
    expect(response).toEqual({ success: true, data: [] });
  });

  it('should flag a batch with failed rides', async () => {
    analyseMany.mockResolvedValue([
      { index: 0, status: 'rejected', error: 'Track has no points', kind: 'EmptyTrack' },
    ]);

    const response = await controller.analyseBatch({ rides: [body()] });

    expect(response.success).toBe(false);
    expect(analyseMany).toHaveBeenCalledWith(expect.any(Array), { join: false });
  });
});
