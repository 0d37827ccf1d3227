import { HttpException, HttpStatus } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { StageType } from '../stages/models/stage.model';
import { RideResponseDto, StageResponseDto } from './dto';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';

const RIDE_ID = '7d3c1a52-8a0e-4b7e-9a55-0d3f6c2b1e90';

describe('ReportsController', () => {
  let controller: ReportsController;
  let getRide: jest.Mock<Promise<RideResponseDto | null>, [string]>;
  let getStages: jest.Mock<Promise<StageResponseDto[] | null>, [string, StageType | undefined]>;
  let deleteRide: jest.Mock<Promise<boolean>, [string]>;

  beforeEach(async () => {
    getRide = jest.fn<Promise<RideResponseDto | null>, [string]>(async () => null);
    getStages = jest.fn<Promise<StageResponseDto[] | null>, [string, StageType | undefined]>(
      async () => [],
    );
    deleteRide = jest.fn<Promise<boolean>, [string]>(async () => false);

    const moduleRef = await Test.createTestingModule({
      controllers: [ReportsController],
      providers: [{ provide: ReportsService, useValue: { getRide, getStages, deleteRide } }],
    }).compile();

    controller = moduleRef.get(ReportsController);
  });

  it('should answer 404 for an unknown ride', async () => {
    const error = await controller.getRide(RIDE_ID).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpException);
    expect(error instanceof HttpException && error.getStatus()).toBe(HttpStatus.NOT_FOUND);
    expect(error instanceof HttpException && error.getResponse()).toEqual({
      statusCode: 404,
      message: `Ride ${RIDE_ID} not found`,
      error: 'Not Found',
    });
  });

  it('should pass the stage type filter through', async () => {
    await expect(controller.getStages(RIDE_ID, { type: StageType.MOVING })).resolves.toEqual([]);

    expect(getStages).toHaveBeenCalledWith(RIDE_ID, 'Moving');
  });

  it('should answer 404 when deleting an unknown ride', async () => {
    await expect(controller.deleteRide(RIDE_ID)).rejects.toBeInstanceOf(HttpException);

    deleteRide.mockResolvedValue(true);
    await expect(controller.deleteRide(RIDE_ID)).resolves.toBeUndefined();
  });
});
