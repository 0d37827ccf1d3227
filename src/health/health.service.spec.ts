import { Test } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import { GeocodingService, IGeocodingStatus } from '../geocoding/services/geocoding.service';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let service: HealthService;
  let query: jest.Mock<Promise<Array<{ now: Date }>>, [string]>;
  let status: IGeocodingStatus;
  let dataSource: { isInitialized: boolean; query: typeof query };

  beforeEach(async () => {
    query = jest.fn<Promise<Array<{ now: Date }>>, [string]>(async () => [
      { now: new Date('2024-06-01T10:00:00Z') },
    ]);
    dataSource = { isInitialized: true, query };
    status = {
      enabled: true,
      ready: true,
      placeCount: 4,
      cellCount: 3,
      countries: [
        { countryCode: 'GB', status: 'loaded', placeCount: 4 },
        { countryCode: 'IE', status: 'failed', placeCount: 0, error: 'timeout' },
      ],
      regions: { countries: 250, admin1: 4, admin2: 12 },
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        HealthService,
        { provide: getDataSourceToken(), useValue: dataSource },
        {
          provide: GeocodingService,
          useValue: { getStatus: () => status, isReady: () => status.ready },
        },
      ],
    }).compile();

    service = moduleRef.get(HealthService);
  });

  it('should report both services up', async () => {
    const result = await service.check();

    expect(result.status).toBe('ok');
    expect(result.services.database).toEqual({
      status: 'up',
      details: {
        message: 'Database is healthy',
        connected: true,
        serverTime: new Date('2024-06-01T10:00:00Z'),
      },
    });
    expect(result.services.geocoding).toEqual({
      status: 'up',
      details: { message: 'Gazetteer unavailable for IE', ...status },
    });
  });

  it('should report the database down when the query fails', async () => {
    query.mockRejectedValue(new Error('connection refused'));

    const result = await service.check();

    expect(result.services.database).toEqual({
      status: 'down',
      details: { error: 'Database check failed: connection refused' },
    });
  });

  it('should be ready without the gazetteer', () => {
    status.ready = false;

    expect(service.ready()).toEqual({ status: 'ready', database: true, geocoding: false });

    dataSource.isInitialized = false;
    expect(service.ready().status).toBe('not ready');
  });
});
