import { HttpService as NestHttpService } from '@nestjs/axios';
import { Test } from '@nestjs/testing';
import { AxiosHeaders, AxiosRequestConfig, AxiosResponse } from 'axios';
import { Observable, of, throwError } from 'rxjs';
import { GeonamesHttpService } from './http.service';

const response = (data: ArrayBuffer): AxiosResponse<ArrayBuffer> => ({
  data,
  status: 200,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

describe('GeonamesHttpService', () => {
  let service: GeonamesHttpService;
  let get: jest.Mock<Observable<AxiosResponse<ArrayBuffer>>, [string, AxiosRequestConfig]>;

  beforeEach(async () => {
    get = jest.fn<Observable<AxiosResponse<ArrayBuffer>>, [string, AxiosRequestConfig]>(() =>
      of(response(new Uint8Array([80, 75, 3, 4]).buffer)),
    );

    const moduleRef = await Test.createTestingModule({
      providers: [GeonamesHttpService, { provide: NestHttpService, useValue: { get } }],
    }).compile();

    service = moduleRef.get(GeonamesHttpService);
  });

  it('should download the file as a buffer', async () => {
    const body = await service.download('GB.zip');

    expect([...body]).toEqual([80, 75, 3, 4]);
    expect(get.mock.calls[0][0]).toMatch(/GB\.zip$/);
    expect(get.mock.calls[0][1]).toMatchObject({ responseType: 'arraybuffer' });
  });

  it('should propagate request failures', async () => {
    get.mockReturnValue(throwError(() => new Error('timeout of 30000ms exceeded')));

    await expect(service.download('GB.zip')).rejects.toThrow('timeout of 30000ms exceeded');
  });
});
